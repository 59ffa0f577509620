import { defineConfig } from '@playwright/test';

// Specs run in plain Node workers; none of them request a browser fixture.
export default defineConfig({
  testDir: './tests/unit',
  fullyParallel: false,
  retries: 0,
  timeout: 60000
});
