import { describe, it, expect } from 'vitest';
import { defaultLogFile, transportFor } from '@/utils/logger';

describe('transportFor', () => {
  it('should write the file target to the given path', () => {
    expect(transportFor('pino/file', 'out/run.log')).toEqual({
      target: 'pino/file',
      options: { destination: 'out/run.log', mkdir: true },
    });
  });

  it('should default the file target to a timestamped log file', () => {
    const transport = transportFor('pino/file');

    expect(transport.options?.['destination']).toMatch(/^logs\/dtn-relay-[\d-]+T[\d-]+Z\.log$/);
  });

  it('should pretty-print to the terminal otherwise', () => {
    expect(transportFor('pino-pretty')).toEqual({
      target: 'pino-pretty',
      options: { colorize: true, translateTime: 'SYS:standard', ignore: 'pid,hostname' },
    });
  });
});

describe('defaultLogFile', () => {
  it('should stamp the file name with the creation time', () => {
    expect(defaultLogFile(new Date('2024-03-01T12:30:45.123Z'))).toBe(
      'logs/dtn-relay-2024-03-01T12-30-45-123Z.log'
    );
  });
});
