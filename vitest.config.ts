/**
 * Vitest Configuration
 *
 * Shared settings:
 * - globals: true (enables global test functions)
 * - environment: 'node'
 */
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
  },
});
