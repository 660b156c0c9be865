import { defineProject } from 'vitest/config';

export default defineProject({
  test: {
    name: 'eventbus',
    include: ['src/**/*.test.ts'],
    environment: 'node',
  },
});
