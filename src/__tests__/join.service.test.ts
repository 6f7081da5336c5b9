import { JoinKeyMissing, NoJoinKey } from '../core/errors';
import { accountKeySet, joinAccounts, joinContacts } from '../services/join.service';
import { table } from './helpers/tables';

const activity = table(
  ['Account Name', 'CustomerId_NAR', 'Type'],
  [
    ['Acme', 'A1', 'Meeting'],
    ['Acme', 'A1', 'Email'],
    ['Globex', 'G2', 'Email'],
    ['Initech', 'I3', 'Call'],
    ['Unknown', '', 'Call'],
  ]
);

const firmographics = table(
  ['CustomerId_NAR', 'Account Name', 'Technographics'],
  [
    ['A1', 'Acme Inc', 'ADC'],
    ['A1', 'Acme Inc', 'WAF'],
    ['G2', 'Globex Ltd', 'CDN'],
  ]
);

describe('joinAccounts', () => {
  test('should keep every activity row and repeat rows per firmographic match', () => {
    const joined = joinAccounts(activity, firmographics);

    // 2 Acme rows x 2 matches + 1 Globex + 1 Initech + 1 keyless
    expect(joined.rows).toHaveLength(7);
    expect(joined.rows.filter(row => row['Account Name'] === 'Acme').map(row => row.Technographics)).toEqual([
      'ADC', 'WAF', 'ADC', 'WAF',
    ]);
  });

  test('should match the sum of per-key match counts', () => {
    const matchesPerRow = activity.rows.map(row =>
      Math.max(1, firmographics.rows.filter(f => row.CustomerId_NAR !== null && f.CustomerId_NAR === row.CustomerId_NAR).length)
    );
    const joined = joinAccounts(activity, firmographics);
    expect(joined.rows.length).toBe(matchesPerRow.reduce((sum, n) => sum + n, 0));
  });

  test('should suffix colliding firmographic columns instead of overwriting', () => {
    const joined = joinAccounts(activity, firmographics);

    expect(joined.columns).toEqual(['Account Name', 'CustomerId_NAR', 'Type', 'Account Name_DB', 'Technographics']);
    expect(joined.rows[0]).toEqual({
      'Account Name': 'Acme',
      CustomerId_NAR: 'A1',
      Type: 'Meeting',
      'Account Name_DB': 'Acme Inc',
      Technographics: 'ADC',
    });
  });

  test('should null out firmographic columns for unmatched rows', () => {
    const joined = joinAccounts(activity, firmographics);
    const initech = joined.rows.find(row => row['Account Name'] === 'Initech');

    expect(initech).toEqual({
      'Account Name': 'Initech',
      CustomerId_NAR: 'I3',
      Type: 'Call',
      'Account Name_DB': null,
      Technographics: null,
    });
  });

  test('should not mutate its inputs', () => {
    const before = JSON.stringify(activity);
    joinAccounts(activity, firmographics);
    expect(JSON.stringify(activity)).toBe(before);
  });

  test('should raise JoinKeyMissing when either table lacks the key', () => {
    const noKey = table(['Account Name'], [['Acme']]);
    expect(() => joinAccounts(noKey, firmographics)).toThrow(JoinKeyMissing);
    expect(() => joinAccounts(activity, noKey)).toThrow(JoinKeyMissing);
    expect(() => joinAccounts(activity, firmographics, 'Account Id')).toThrow('Join key "Account Id" is missing from the activity table');
  });
});

describe('accountKeySet', () => {
  test('should collect normalized ids of one account', () => {
    const rows = table(
      ['Account Name', 'CustomerId_NAR'],
      [
        ['Acme', 'H-CIT-1001'],
        ['Acme', 'CIT-1002'],
        ['Acme', ''],
        ['Globex', 'H-2002'],
      ]
    );
    expect([...accountKeySet(rows, 'Acme')].sort()).toEqual(['1001', '1002']);
  });
});

describe('joinContacts', () => {
  const contacts = table(
    ['Party_ID', 'party_unique_name'],
    [
      ['h-cit-1001', 'Jane Doe'],
      ['1002', 'John Smith'],
      ['CIT-3003', 'Ana Lopez'],
      ['', 'No Key'],
    ]
  );

  test('should keep exactly the contacts whose normalized key is in the set', () => {
    const joined = joinContacts(contacts, new Set(['1001', '1002']));

    expect(joined.rows.map(row => row.party_unique_name)).toEqual(['Jane Doe', 'John Smith']);
  });

  test('should add only the normalized key column', () => {
    const joined = joinContacts(contacts, new Set(['1001']));

    expect(joined.columns).toEqual(['Party_ID', 'party_unique_name', 'party_number_clean']);
    expect(joined.rows[0]).toEqual({ Party_ID: 'h-cit-1001', party_unique_name: 'Jane Doe', party_number_clean: '1001' });
  });

  test('should pick the first alias present', () => {
    const both = table(['party_id', 'party_number', 'party_unique_name'], [['1', '2', 'Jane Doe']]);

    expect(joinContacts(both, new Set(['2'])).rows).toHaveLength(1);
    expect(joinContacts(both, new Set(['1'])).rows).toHaveLength(0);
  });

  test('should raise NoJoinKey when no alias is present', () => {
    const noKey = table(['contact_id', 'party_unique_name'], [['1', 'Jane Doe']]);
    expect(() => joinContacts(noKey, new Set(['1']))).toThrow(NoJoinKey);
  });
});
