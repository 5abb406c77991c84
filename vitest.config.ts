import { defineConfig } from 'vitest/config';
import { tmpdir } from 'os';
import path from 'path';

export default defineConfig({
  test: {
    include: ['packages/*/src/**/*.test.ts'],
    env: {
      VM_REPORT_LOG_DIR: path.join(tmpdir(), 'vm-report-test-logs'),
    },
  },
});
