import { defineWorkspace } from 'vitest/config';

export default defineWorkspace(['./shared/vitest.config.ts', './backend/vitest.config.ts']);
