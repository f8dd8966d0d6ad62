import { defineConfig } from '@playwright/test';

// Specs here never open a page, so no browser project is configured.
export default defineConfig({
  testDir: './tests',
  testMatch: '**/*.spec.ts',
  fullyParallel: true,
  timeout: 30_000,
});
