#!/usr/bin/env node
import * as readline from 'readline';
import { dashboardService, DashboardService, DashboardSnapshot } from './services/dashboard.service';
import type { ViewResult } from './types';

const HELP = 'Type an account name, "top" for the most engaged accounts, "reload" to re-read sources, or "exit" to quit';

function unavailable(view: Extract<ViewResult<unknown>, { available: false }>): string {
  return `unavailable (${view.reason})`;
}

/**
 * Text report for one account: named engagements and contact cards.
 */
export function describeAccount(dashboard: DashboardService, snapshot: DashboardSnapshot, account: string): string[] {
  const lines: string[] = [];
  const timeline = dashboard.accountTimeline(snapshot, account);
  const firmographics = dashboard.firmographicsPanel(snapshot, account);
  const contacts = dashboard.contactCards(snapshot, account);

  lines.push(`Account: ${account}`);
  lines.push(`Named engagements: ${timeline.available ? timeline.data.length : unavailable(timeline)}`);
  if (firmographics.available) {
    const matches = firmographics.data.highlights.map(({ category, matches }) => `${category}: ${matches}`);
    lines.push(`Firmographic matches: ${matches.length > 0 ? matches.join('; ') : 'none'}`);
  } else {
    lines.push(`Firmographic matches: ${unavailable(firmographics)}`);
  }

  if (!contacts.available) {
    lines.push(`Contacts: ${unavailable(contacts)}`);
    return lines;
  }

  const { counts, contacts: cards } = contacts.data;
  lines.push(`Contacts: ${contacts.data.total} (affinity ${counts.affinity}, engaged ${counts.engaged}, unengaged ${counts.unengaged})`);
  for (const card of cards) {
    const marker = card.isEngaged ? '*' : ' ';
    const title = card.title ? ` - ${card.title}` : '';
    const affinity = card.affinityCode ? ` [${card.affinityCode}]` : '';
    lines.push(` ${marker} ${card.status.padEnd(9)} ${card.name}${title}${affinity}`);
  }
  return lines;
}

export function describeTopAccounts(dashboard: DashboardService, snapshot: DashboardSnapshot): string[] {
  const top = dashboard.topAccounts(snapshot, {});
  if (!top.available) return [`Top accounts: ${unavailable(top)}`];
  if (top.data.length === 0) return ['No records found with associated names.'];
  return top.data.map((entry, index) => `${String(index + 1).padStart(2)}. ${entry.account} (${entry.activityCount})`);
}

async function initCLI(dashboard: DashboardService = dashboardService) {
  let snapshot = await dashboard.getSnapshot();

  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });

  console.log('\nAccount Engagement Explorer\n');
  console.log(`${HELP}\n`);

  const askQuestion = () => {
    rl.question('explorer > ', async (input) => {
      const command = input.trim();

      if (command.toLowerCase() === 'exit') {
        rl.close();
        return;
      }

      if (!command) {
        askQuestion();
        return;
      }

      try {
        if (command.toLowerCase() === 'top') {
          describeTopAccounts(dashboard, snapshot).forEach(line => console.log(line));
        } else if (command.toLowerCase() === 'reload') {
          snapshot = await dashboard.reload();
          console.log(`Reloaded: ${snapshot.activity.rows.length} activity rows`);
        } else if (dashboard.filterOptions(snapshot).accounts.includes(command)) {
          describeAccount(dashboard, snapshot, command).forEach(line => console.log(line));
        } else {
          console.log(`No account named "${command}". ${HELP}`);
        }
      } catch (error) {
        console.error('\nError:', error instanceof Error ? error.message : String(error), '\n');
      }

      console.log('');
      askQuestion();
    });
  };

  askQuestion();
}

if (require.main === module) {
  initCLI().catch((error: Error) => {
    console.error(error.message);
    process.exit(1);
  });
}
