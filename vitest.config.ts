import { defineConfig } from 'vitest/config'

export default defineConfig({
  esbuild: { jsx: 'automatic' },
  test: {
    include: ['apps/*/src/**/__tests__/**/*.test.{ts,tsx}'],
    environment: 'node',
  },
})
