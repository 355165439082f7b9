import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    // The engine runs under plain Node; hook tests opt into jsdom per file.
    environment: 'node',
    setupFiles: ['./tests/ts/setup.ts'],
    include: ['tests/ts/**/*.test.{ts,tsx}'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'json-summary', 'html'],
      reportsDirectory: './coverage/ts',
      include: ['src/**/*.ts'],
      exclude: ['src/**/*.d.ts', 'src/index.ts'],
    },
  },
});
