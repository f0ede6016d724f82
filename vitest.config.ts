import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: [
      'packages/**/test/**/*.spec.ts',
      'tests/**/*.spec.ts'
    ],
    reporters: ['default'],
    env: {
      // keep pino quiet; tests assert notes, not log lines
      FRAMEBRIDGE_LOG_LEVEL: 'silent'
    },
    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov'],
      include: ['packages/**/src/**/*.ts'],
      exclude: [
        '**/node_modules/**',
        '**/dist/**',
        '**/test/**',
        '**/*.spec.ts'
      ]
    }
  }
});
