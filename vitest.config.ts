import path from 'node:path';
import { fileURLToPath } from 'node:url';

import { defineConfig } from 'vitest/config';

const root = path.dirname(fileURLToPath(import.meta.url));

const PACKAGES = ['types', 'pbn', 'core', 'engine-client', 'llm', 'server', 'test-utils'];

export default defineConfig({
  resolve: {
    alias: Object.fromEntries(
      PACKAGES.map((name) => [
        `@bridge-analyst/${name}`,
        path.resolve(root, 'packages', name, 'src', 'index.ts'),
      ]),
    ),
  },
  test: {
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts'],
    testTimeout: 30000, // 30 seconds for the listener tests
  },
});
