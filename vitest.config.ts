import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const src = fileURLToPath(new URL('./src', import.meta.url));

export default defineConfig({
  resolve: {
    alias: [
      { find: /^@logger$/, replacement: `${src}/utils/logger.ts` },
      { find: /^@types$/, replacement: `${src}/ws/types/index.ts` },
      { find: /^@config\/(.*)\.js$/, replacement: `${src}/config/$1.ts` },
      { find: /^@utils\/(.*)\.js$/, replacement: `${src}/utils/$1.ts` },
      { find: /^@ws\/(.*)\.js$/, replacement: `${src}/ws/$1.ts` },
    ],
  },
  test: {
    environment: 'node',
    include: ['tests/**/*.spec.ts'],
    env: {
      NODE_ENV: 'test',
    },
  },
});
