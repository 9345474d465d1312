import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['team-pipeline/src/**/*.spec.ts'],
    exclude: ['**/node_modules/**', '**/dist/**', '**/website/**'],
  },
});
