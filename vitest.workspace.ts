import { defineWorkspace } from 'vitest/config';

export default defineWorkspace([
  'apps/server',
  'packages/db',
  'packages/delivery',
  'packages/shared',
]);
