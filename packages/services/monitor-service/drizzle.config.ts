import { defineConfig } from 'drizzle-kit';

const getDatabaseUrl = () => {
  const url = process.env.MONITOR_DATABASE_URL || process.env.DATABASE_URL;
  if (!url) {
    throw new Error('MONITOR_DATABASE_URL (preferred) or DATABASE_URL environment variable is required for monitor-service.');
  }
  return url;
};

export default defineConfig({
  schema: './src/schema/monitor-schema.ts',
  out: './drizzle',
  dialect: 'postgresql',
  dbCredentials: {
    url: getDatabaseUrl(),
  },
  tablesFilter: ['mon_*'],
  verbose: true,
  strict: true,
});
