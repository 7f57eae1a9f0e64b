import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['video-client/src/test/**/*.test.ts', 'video-cli/src/test/**/*.test.ts'],
    environment: 'node'
  }
});
