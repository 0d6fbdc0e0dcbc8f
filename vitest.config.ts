import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'jsdom',
    // Reads bundled assets from disk; the web transform would rewrite
    // `new URL(..., import.meta.url)` into a served asset path.
    environmentMatchGlobs: [['src/animations.test.ts', 'node']],
    include: ['src/**/*.test.ts'],
  },
});
