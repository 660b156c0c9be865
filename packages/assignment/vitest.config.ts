import { defineProject } from 'vitest/config';

export default defineProject({
  test: {
    name: 'assignment',
    include: ['src/**/*.test.ts'],
    environment: 'node',
  },
});
