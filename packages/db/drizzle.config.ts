import { defineConfig } from 'drizzle-kit';

export default defineConfig({
  schema: ['./src/schema/chat.ts'],
  out: './drizzle',
  dialect: 'sqlite',
});
