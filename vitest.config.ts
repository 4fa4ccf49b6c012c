import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const packages = [
  'cli', 'consensus', 'crypto', 'ledger', 'network', 'node', 'simulation', 'types',
];

const alias: Record<string, string> = {};
for (const pkg of packages) {
  alias[`@bftsim/${pkg}`] = fileURLToPath(new URL(`./packages/${pkg}/src/index.ts`, import.meta.url));
}

export default defineConfig({
  resolve: { alias },
  test: {
    include: ['packages/*/src/**/*.test.ts', 'tests/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      include: ['packages/*/src/**/*.ts'],
      exclude: ['packages/*/src/**/*.test.ts', 'packages/cli/src/bin.ts'],
      thresholds: {
        statements: 90,
        branches: 85,
        functions: 90,
        lines: 90,
      },
      reporter: ['text', 'text-summary'],
    },
  },
});
