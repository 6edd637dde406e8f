/**
 * Test fakes
 */

import { createLogger, type Logger } from '@/infra/logger/index.js';

/** Silent logger for tests that do not inspect log output. */
export const testLogger: Logger = createLogger({ level: 'silent' });

export interface CapturedLogs {
  logger: Logger;
  /** Parsed log lines, oldest first. */
  entries: () => Record<string, unknown>[];
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * Logger that records every line it writes, at trace level and above.
 */
export const makeCapturingLogger = (): CapturedLogs => {
  const lines: string[] = [];
  const logger = createLogger(
    { level: 'trace', name: 'test' },
    {
      write(line: string) {
        lines.push(line);
      },
    }
  );

  return {
    logger,
    entries: () =>
      lines.map((line) => {
        const parsed: unknown = JSON.parse(line);
        return isRecord(parsed) ? parsed : {};
      }),
  };
};
