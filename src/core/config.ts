import dotenv from 'dotenv';

dotenv.config();

function parseList(value: string | undefined, fallback: string[]): string[] {
  if (!value) return fallback;
  const items = value.split(',').map(item => item.trim()).filter(Boolean);
  return items.length > 0 ? items : fallback;
}

export const config = {
  sources: {
    activity: process.env.ACTIVITY_SOURCE || '',
    firmographics: process.env.FIRMOGRAPHIC_SOURCE || '',
    contacts: process.env.CONTACTS_SOURCE || '',
    // Tried in order until one decodes cleanly
    encodings: parseList(process.env.SOURCE_ENCODINGS, ['utf-8', 'latin1']),
    fetchTimeout: parseInt(process.env.SOURCE_FETCH_TIMEOUT || '30000'), // 30s per remote source
  },
  server: {
    port: parseInt(process.env.PORT || '3002'),
    env: process.env.NODE_ENV || 'development',
  },
  logging: {
    level: process.env.LOG_LEVEL || 'info',
  },
  query: {
    resultLimit: parseInt(process.env.RESULT_LIMIT || '100'),
    topAccounts: parseInt(process.env.TOP_ACCOUNTS || '10'),
  },
};

export type SourceConfig = Pick<typeof config.sources, 'activity' | 'firmographics' | 'contacts' | 'encodings'>;
