import { readdir, readFile } from 'fs/promises';
import path from 'path';
import pLimit from 'p-limit';
import { z } from 'zod';
import {
  AppError,
  CategoryPattern,
  ExtractCategory,
  ExtractLoadError,
  ResultAsync,
  safeCallAsync,
} from '@optionlens/shared';
import { extractSchemas, FileSet, SourceTagged } from '../types/extracts';
import { CsvHeader, parseCsvLine, resolveHeader, toRecord } from '../utils/csv';
import { loaderLogger } from '../utils/logger';

export interface FileSetOptions {
  dataDirectory: string;
  categoryPatterns: CategoryPattern[];
  delimiter?: string;
  readConcurrency?: number;
}

type Limit = ReturnType<typeof pLimit>;

// Cells come in as strings; each category schema decides the row shape it produces
type RowSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

/**
 * Names of the files a category pattern routes to, in the order given.
 * Each pattern is evaluated on its own, so one file may land in several categories.
 */
export function matchCategoryFiles(fileNames: string[], pattern: RegExp | undefined): string[] {
  if (!pattern) {
    return [];
  }
  // Global and sticky flags would carry lastIndex from one file name to the next
  const matcher = new RegExp(pattern.source, pattern.flags.replace(/[gy]/g, ''));
  return fileNames.filter(fileName => matcher.test(fileName));
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

async function readExtractFile<T extends object>(
  category: ExtractCategory,
  schema: RowSchema<T>,
  directory: string,
  fileName: string,
  delimiter: string
): Promise<Array<T & SourceTagged>> {
  let content: string;
  try {
    content = await readFile(path.join(directory, fileName), 'utf8');
  } catch (error) {
    throw new ExtractLoadError(category, fileName, error instanceof Error ? error.message : String(error));
  }

  const lines = content.replace(/^\uFEFF/, '').split(/\r?\n/);
  const rows: Array<T & SourceTagged> = [];
  let header: CsvHeader | null = null;

  for (let index = 0; index < lines.length; index++) {
    const line = lines[index];
    const lineNumber = index + 1;
    if (!line.trim()) {
      continue;
    }

    const cells = parseCsvLine(line, delimiter);
    if (!cells) {
      throw new ExtractLoadError(category, fileName, 'unterminated quoted cell', lineNumber);
    }

    if (!header) {
      header = resolveHeader(cells);
      continue;
    }

    if (cells.length !== header.width) {
      throw new ExtractLoadError(
        category,
        fileName,
        `expected ${header.width} cells, found ${cells.length}`,
        lineNumber
      );
    }

    const parsed = schema.safeParse(toRecord(header, cells));
    if (!parsed.success) {
      throw new ExtractLoadError(category, fileName, describeIssues(parsed.error), lineNumber);
    }
    rows.push({ ...parsed.data, source_file: fileName });
  }

  if (!header) {
    throw new ExtractLoadError(category, fileName, 'file has no header row');
  }

  return rows;
}

/**
 * Load every file routed to one category and concatenate the rows in file order.
 * Any bad file rejects the whole category.
 */
export async function loadCategory<T extends object>(
  category: ExtractCategory,
  schema: RowSchema<T>,
  directory: string,
  fileNames: string[],
  delimiter: string = ',',
  limit: Limit = pLimit(1)
): Promise<Array<T & SourceTagged>> {
  const tables = await Promise.all(
    fileNames.map(fileName => limit(() => readExtractFile(category, schema, directory, fileName, delimiter)))
  );
  const rows = tables.flat();
  loaderLogger.categoryLoaded(category, fileNames, rows.length);
  return rows;
}

async function listDataFiles(directory: string): Promise<string[]> {
  const entries = await readdir(directory, { withFileTypes: true });
  return entries
    .filter(entry => entry.isFile())
    .map(entry => entry.name)
    .sort();
}

async function loadAll(options: FileSetOptions): Promise<FileSet> {
  const { dataDirectory, categoryPatterns } = options;
  const delimiter = options.delimiter ?? ',';
  const limit = pLimit(options.readConcurrency ?? 4);
  const startTime = Date.now();

  const fileNames = await listDataFiles(dataDirectory);
  const filesFor = (category: ExtractCategory): string[] =>
    matchCategoryFiles(fileNames, categoryPatterns.find(entry => entry.category === category)?.pattern);

  const [stream, snapshot, optionSpace, stockPrices, stockOptions, moneynessPrices] = await Promise.all([
    loadCategory('stream', extractSchemas.stream, dataDirectory, filesFor('stream'), delimiter, limit),
    loadCategory('snapshot', extractSchemas.snapshot, dataDirectory, filesFor('snapshot'), delimiter, limit),
    loadCategory('option_space', extractSchemas.option_space, dataDirectory, filesFor('option_space'), delimiter, limit),
    loadCategory('stock_prices', extractSchemas.stock_prices, dataDirectory, filesFor('stock_prices'), delimiter, limit),
    loadCategory('stock_options', extractSchemas.stock_options, dataDirectory, filesFor('stock_options'), delimiter, limit),
    loadCategory(
      'moneyness_prices',
      extractSchemas.moneyness_prices,
      dataDirectory,
      filesFor('moneyness_prices'),
      delimiter,
      limit
    ),
  ]);

  loaderLogger.performanceMetric('file_set_load', Date.now() - startTime);

  return {
    stream,
    snapshot,
    option_space: optionSpace,
    stock_prices: stockPrices,
    stock_options: stockOptions,
    moneyness_prices: moneynessPrices,
  };
}

/**
 * Discover, route and load all six extract categories from a data directory.
 * Resolves to an Err naming the category and file when any file is unreadable or malformed.
 */
export function loadFileSet(options: FileSetOptions): ResultAsync<FileSet, AppError> {
  return safeCallAsync(() => loadAll(options));
}
