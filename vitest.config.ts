import { defineConfig } from 'vitest/config';
import path from 'path';

export default defineConfig({
  test: {
    exclude: [
      '**/node_modules/**',
      '**/dist/**',
      '**/.{idea,git,cache,output,temp}/**'
    ],
    include: ['packages/**/*.{test,spec}.{ts,tsx}'],
  },
  resolve: {
    alias: {
      '@clinical-scribe/shared': path.resolve(__dirname, './packages/shared/src/index.ts')
    }
  }
});
