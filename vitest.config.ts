import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['apps/*/src/**/*.{test,spec}.{ts,tsx}'],
    exclude: ['**/node_modules/**', '**/dist/**', '**/build/**'],
  },
  define: {
    'import.meta.env.VITE_CELL_SIZE': JSON.stringify(process.env.VITE_CELL_SIZE || '80'),
    'import.meta.env.VITE_LOG_EVENTS': JSON.stringify(process.env.VITE_LOG_EVENTS || 'false'),
  },
})
