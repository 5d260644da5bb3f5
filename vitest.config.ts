import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['playlist-exporter/tests/**/*.spec.ts'],
    environment: 'node',
    env: {
      LOG_LEVEL: 'error',
      SPOTIFY_AUTH_TOKEN: '',
      SPOTIFY_MIN_REQUEST_INTERVAL_MS: '1',
    },
  },
});
