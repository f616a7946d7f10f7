import { defineConfig } from 'drizzle-kit';

export default defineConfig({
  dialect: 'postgresql',
  schema: './packages/repositories/src/postgres/schema/index.ts',
  out: './packages/repositories/drizzle',
  dbCredentials: {
    url: process.env.TCEC_DATABASE_URL ?? 'postgres://localhost:5432/engine_watch',
  },
});
