import { defineWorkspace } from 'vitest/config';

export default defineWorkspace([
  'packages/core',
  'packages/eventbus',
  'packages/state',
  'packages/repair',
  'packages/runtime',
  'apps/cli',
]);
