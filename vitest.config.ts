import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['test/**/*.test.ts'],
    coverage: {
      // Use v8 provider for coverage
      provider: 'v8',
      // Generate a text summary in the console as well as a full HTML report
      reporter: ['text', 'html'],
      include: ['src/**/*.ts'],
      // The executable only wires the environment to the program
      exclude: ['src/cli.ts', 'src/lib/types.ts'],
    },
  },
});
