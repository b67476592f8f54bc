import os from 'os';
import path from 'path';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/__tests__/**/*.test.{ts,tsx}'],
    environment: 'node',
    testTimeout: 10000,
    env: {
      BUOYTERM_LOG_LEVEL: 'silent',
      BUOYTERM_LOG_PATH: path.join(os.tmpdir(), 'buoyterm-test.log'),
    },
  },
});
