import { defineConfig } from 'vitest/config';

// force vitest to use CI mode to avoid watch mode
process.env.CI = 'true';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['tests/unit/specs/**/*.spec.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    restoreMocks: true,
    unstubEnvs: true,
  },
});
