import { describeAccount, describeTopAccounts } from '../cli';
import { DashboardService } from '../services/dashboard.service';
import { fixtureSources, StaticLoader, table } from './helpers/tables';

describe('CLI reports', () => {
  const dashboard = new DashboardService(fixtureSources);

  test('should describe an account with its contact cards', async () => {
    const lines = describeAccount(dashboard, await dashboard.getSnapshot(), 'Acme Corp');

    expect(lines).toEqual([
      'Account: Acme Corp',
      'Named engagements: 2',
      'Firmographic matches: f5_core_adc: BIG-IP; f5_security: WAF',
      'Contacts: 4 (affinity 1, engaged 2, unengaged 1)',
      ' * engaged   Jane Doe - VP Infrastructure',
      ' * engaged   Raj Kumar Patel - Network Engineer',
      '   affinity  John Smith - CIO [X]',
      '   unengaged Prince - Consultant',
    ]);
  });

  test('should number the top accounts', async () => {
    expect(describeTopAccounts(dashboard, await dashboard.getSnapshot())).toEqual([
      ' 1. Acme Corp (2)',
      ' 2. Globex (2)',
    ]);
  });

  test('should say so when no activity carries a name', async () => {
    const sources = { activity: 'activity', firmographics: 'firmographics', contacts: 'contacts', encodings: ['utf-8'] };
    const empty = new DashboardService(sources, new StaticLoader({
      activity: table(['Account Name', 'CustomerId_NAR', 'First Name', 'Activity Date'], [['Acme', '1', '', '2024-01-01']]),
      firmographics: table(['CustomerId_NAR'], []),
      contacts: table(['party_number'], []),
    }));

    expect(describeTopAccounts(empty, await empty.getSnapshot())).toEqual(['No records found with associated names.']);
  });
});
