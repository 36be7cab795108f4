// src/tests/configurable-logger.test.ts
import { ConfigurableLogger } from '../utils/configurable-logger';
import { LoggingProfile } from '../types/config.types';

const profile: LoggingProfile = {
  appendTimestamp: true,
  timestampFormat: 'YYYY-MM-DD-HHmmss',
  logLevel: 'info',
  enableWarningLog: true,
  logDirectory: 'logs',
};

describe('ConfigurableLogger.generateLogFilename', () => {
  const startedAt = new Date(2024, 2, 5, 7, 8, 9);

  it('should append the start time before the extension', () => {
    expect(ConfigurableLogger.generateLogFilename('combined.log', profile, startedAt)).toBe(
      'combined-2024-03-05-070809.log'
    );
  });

  it('should keep the name when timestamps are off', () => {
    expect(
      ConfigurableLogger.generateLogFilename('error.log', { ...profile, appendTimestamp: false }, startedAt)
    ).toBe('error.log');
  });
});
