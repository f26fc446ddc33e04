/**
 * Vitest Configuration
 *
 * Tests live under tests/ and import describe/it/expect from 'vitest'.
 */
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'tessel',
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'html', 'lcov'],
      include: ['src/**/*.ts'],
      exclude: ['src/index.ts', 'src/cli.ts'],
    },
  },
});
