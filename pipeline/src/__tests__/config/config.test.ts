import path from 'path';
import { ConfigError, safeCall } from '@optionlens/shared';
import { buildConfig } from '../../config';

function withEnv(name: string, value: string, fn: () => void): void {
  const previous = process.env[name];
  process.env[name] = value;
  try {
    fn();
  } finally {
    if (previous === undefined) {
      delete process.env[name];
    } else {
      process.env[name] = previous;
    }
  }
}

describe('buildConfig', () => {
  it('should apply defaults when no variables are set', () => {
    const result = buildConfig({});

    expect(result.data.directory).toBe(path.resolve('data'));
    expect(result.data.delimiter).toBe(',');
    expect(result.data.readConcurrency).toBe(4);
    expect(result.data.categoryPatterns.map(entry => entry.category)).toEqual([
      'stream',
      'snapshot',
      'option_space',
      'stock_prices',
      'stock_options',
      'moneyness_prices',
    ]);
  });

  it('should match default patterns case-insensitively', () => {
    const [stream] = buildConfig({}).data.categoryPatterns;

    expect(stream.pattern.test('Option_Stream_2024-01-10.csv')).toBe(true);
    expect(stream.pattern.test('option_snapshot_2024-01-10.csv')).toBe(false);
  });

  it('should take pattern overrides from the environment', () => {
    const result = buildConfig({ PATTERN_STREAM: '^ticks_.*\\.txt$', DATA_DIR: '/tmp/extracts' });
    const stream = result.data.categoryPatterns[0];

    expect(result.data.directory).toBe('/tmp/extracts');
    expect(stream.pattern.test('ticks_1.txt')).toBe(true);
    expect(stream.pattern.test('option_stream_1.csv')).toBe(false);
  });

  it('should reject an unknown log level', () => {
    expect(() => buildConfig({ LOG_LEVEL: 'verbose' })).toThrow(
      'LOG_LEVEL must be one of error, warn, info, debug, got: verbose'
    );
  });

  it('should reject a read concurrency outside 1..32', () => {
    expect(() => buildConfig({ READ_CONCURRENCY: '0' })).toThrow('READ_CONCURRENCY must be between 1 and 32, got: 0');
    expect(() => buildConfig({ READ_CONCURRENCY: 'many' })).toThrow('READ_CONCURRENCY must be between 1 and 32');
  });

  it('should reject a multi-character delimiter', () => {
    expect(() => buildConfig({ CSV_DELIMITER: ';;' })).toThrow('CSV_DELIMITER must be a single character');
  });

  it('should raise a ConfigError naming the variable', () => {
    const result = safeCall(() => buildConfig({ READ_CONCURRENCY: '64' }));

    expect(result._unsafeUnwrapErr()).toEqual({
      message: 'READ_CONCURRENCY must be between 1 and 32, got: 64',
      type: 'CONFIG_ERROR',
      isUserFriendly: true,
    });
    expect(() => buildConfig({ CSV_DELIMITER: '"' })).toThrow(ConfigError);
  });

  it('should report an invalid pattern as a configuration error', () => {
    const error = safeCall(() => buildConfig({ PATTERN_STREAM: '[' }))._unsafeUnwrapErr();

    expect(error.type).toBe('CONFIG_ERROR');
    expect(error.message).toMatch(/^PATTERN_STREAM is not a valid regular expression: /);
  });

  it('should not read process.env when given an explicit environment', () => {
    withEnv('READ_CONCURRENCY', '0', () => {
      expect(buildConfig({}).data.readConcurrency).toBe(4);
    });
  });

  it('should leave the library entry point loadable whatever the environment holds', () => {
    withEnv('LOG_LEVEL', 'loud', () => {
      jest.isolateModules(() => {
        expect(() => require('../../index')).not.toThrow();
      });
    });
  });

  it('should reject an invalid pattern', () => {
    expect(() => buildConfig({ PATTERN_SNAPSHOT: '(' })).toThrow('PATTERN_SNAPSHOT is not a valid regular expression');
  });
});
