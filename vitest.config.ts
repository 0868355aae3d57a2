import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['tests/unit/**/*.test.ts'],
    env: {
      TZ: 'UTC',
      // Тесты не должны зависеть от локального .env
      TIMEZONE: '',
      SUPABASE_URL: '',
      SUPABASE_ANON_KEY: '',
      SITE_NAME: '',
      BLUESKY_HANDLE: '',
      BLUESKY_PASSWORD: '',
      MASTODON_URL: '',
      MASTODON_TOKEN: '',
      TELEGRAM_CHANNEL_ID: '',
      LAST_DIGEST_DATE: '',
    },
  },
});
