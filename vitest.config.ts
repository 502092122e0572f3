import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'ipld-lite',
    watch: false,
    globals: true,
    environment: 'node',
    include: ['{libs,apps}/*/src/**/*.{test,spec}.ts'],
    reporters: ['default'],
  },
});
