import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const source = (pkg: string): string => fileURLToPath(new URL(`./packages/${pkg}/src/index.ts`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@scriptorium/core': source('core'),
      '@scriptorium/iiif': source('iiif'),
      '@scriptorium/ocr-kraken': source('ocr/kraken'),
      '@scriptorium/ocr-tesseract': source('ocr/tesseract'),
      '@scriptorium/ocr-google-vision': source('ocr/google-vision'),
      '@scriptorium/cli': source('cli'),
    },
  },
  test: {
    globals: false,
    environment: 'node',
    include: ['packages/**/tests/**/*.test.ts'],
  },
});
