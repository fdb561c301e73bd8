import { defineConfig } from '@playwright/test';

export default defineConfig({
  testDir: 'tests/unit',
  testMatch: '**/*.spec.ts',
  timeout: 30 * 1000,
  expect: {
    timeout: 5 * 1000,
  },
  outputDir: 'tests/artifacts/playwright',
  use: {
    headless: true,
    viewport: { width: 1280, height: 720 },
  },
});
