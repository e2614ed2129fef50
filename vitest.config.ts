import { defineConfig } from 'vitest/config';

// Due dates print in local time.
process.env.TZ = 'UTC';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    env: {
      TZ: 'UTC',
      NO_COLOR: '1',
    },
  },
});
