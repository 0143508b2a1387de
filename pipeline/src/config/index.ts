import path from 'path';
import { CategoryPattern, ConfigError, EXTRACT_CATEGORIES, ExtractCategory } from '@optionlens/shared';
import { parseLogLevel } from '../utils/logger';

export interface Config {
  data: {
    directory: string;
    delimiter: string;
    readConcurrency: number;
    categoryPatterns: CategoryPattern[];
  };
}

type Env = Record<string, string | undefined>;

const defaultPatterns: Record<ExtractCategory, { envVar: string; source: string }> = {
  stream: { envVar: 'PATTERN_STREAM', source: '^option_stream.*\\.csv$' },
  snapshot: { envVar: 'PATTERN_SNAPSHOT', source: '^option_snapshot.*\\.csv$' },
  option_space: { envVar: 'PATTERN_OPTION_SPACE', source: '^option_space.*\\.csv$' },
  stock_prices: { envVar: 'PATTERN_STOCK_PRICES', source: '^stock_prices.*\\.csv$' },
  stock_options: { envVar: 'PATTERN_STOCK_OPTIONS', source: '^stock_options.*\\.csv$' },
  moneyness_prices: { envVar: 'PATTERN_MONEYNESS_PRICES', source: '^moneyness_prices.*\\.csv$' },
};

function buildPattern(category: ExtractCategory, env: Env): CategoryPattern {
  const { envVar, source } = defaultPatterns[category];
  const value = env[envVar] || source;
  try {
    return { category, pattern: new RegExp(value, 'i') };
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(envVar, `${envVar} is not a valid regular expression: ${reason}`);
  }
}

/**
 * Build the pipeline configuration from environment variables. Callers load any
 * .env file first; this module reads nothing on import.
 * @throws ConfigError on values that would make the run meaningless
 */
export function buildConfig(env: Env = process.env): Config {
  // The loggers read LOG_LEVEL themselves; reject values they would silently ignore
  if (!parseLogLevel(env.LOG_LEVEL || 'info')) {
    throw new ConfigError('LOG_LEVEL', `LOG_LEVEL must be one of error, warn, info, debug, got: ${env.LOG_LEVEL}`);
  }

  const delimiter = env.CSV_DELIMITER || ',';
  if (delimiter.length !== 1 || delimiter === '"') {
    throw new ConfigError('CSV_DELIMITER', `CSV_DELIMITER must be a single character other than a quote, got: ${delimiter}`);
  }

  const readConcurrency = parseInt(env.READ_CONCURRENCY || '4', 10);
  if (isNaN(readConcurrency) || readConcurrency < 1 || readConcurrency > 32) {
    throw new ConfigError('READ_CONCURRENCY', `READ_CONCURRENCY must be between 1 and 32, got: ${env.READ_CONCURRENCY}`);
  }

  return {
    data: {
      directory: path.resolve(env.DATA_DIR || 'data'),
      delimiter,
      readConcurrency,
      categoryPatterns: EXTRACT_CATEGORIES.map(category => buildPattern(category, env)),
    },
  };
}
