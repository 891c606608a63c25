import { createRequire } from 'node:module';
import { defineConfig } from 'vitest/config';

const require = createRequire(import.meta.url);

export default defineConfig({
  resolve: {
    // graphql-http requires the CommonJS build; source imports must share that instance
    alias: [{ find: /^graphql$/, replacement: require.resolve('graphql') }],
  },
  test: {
    include: ['access-engine/test/**/*.test.ts', 'authz-service/test/**/*.test.ts'],
    environment: 'node',
  },
});
