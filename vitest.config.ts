import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

function workspaceEntry(path: string): string {
  return fileURLToPath(new URL(path, import.meta.url));
}

export default defineConfig({
  resolve: {
    alias: {
      '@bidledger/commitment': workspaceEntry('./packages/bid-commitment/src/index.ts'),
      '@bidledger/ledger': workspaceEntry('./services/bid-ledger/src/index.ts'),
    },
  },
  test: {
    include: ['packages/*/test/**/*.test.ts', 'services/*/test/**/*.test.ts'],
    environment: 'node',
  },
});
