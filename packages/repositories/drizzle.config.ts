import { defineConfig } from 'drizzle-kit';

export default defineConfig({
  dialect: 'postgresql',
  schema: './src/postgres/schema/index.ts',
  out: './drizzle',
  dbCredentials: {
    url: process.env.PROCESSING_DATABASE_URL ?? 'postgres://localhost:5432/carechain',
  },
});
