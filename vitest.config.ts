import path from 'node:path'
import { defineConfig } from 'vitest/config'

const workspace = (dir: string) => path.resolve(__dirname, dir)

export default defineConfig({
  resolve: {
    alias: {
      '@blockmem/types': workspace('packages/types/src/index.ts'),
      '@blockmem/core': workspace('packages/core/src/index.ts'),
      '@blockmem/memory': workspace('packages/memory/src/index.ts'),
      '@blockmem/node': workspace('infra/node/index.ts'),
    },
  },
  test: {
    environment: 'node',
    include: [
      'packages/*/src/**/__tests__/**/*.test.ts',
      'infra/node/services/__tests__/**/*.test.ts',
    ],
    env: {
      LOG_LEVEL: 'error',
    },
  },
})
