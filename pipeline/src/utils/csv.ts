export type CsvRecord = Record<string, string | null>;

export interface CsvHeader {
  columns: string[];
  // Number of leading index columns to drop from every row
  skip: number;
  width: number;
}

const INDEX_COLUMN = /^(?:Unnamed: \d+)?$/;

/**
 * Split one delimited line into cells. A cell that opens with a double quote may
 * contain the delimiter and escaped quotes (""); a quote anywhere else is literal.
 * @returns the cells, or null if a quoted cell is not terminated on this line
 */
export function parseCsvLine(line: string, delimiter: string = ','): string[] | null {
  const cells: string[] = [];
  let current = '';
  let inQuotes = false;
  let cellStart = true;

  for (let i = 0; i < line.length; i++) {
    const char = line[i];

    if (inQuotes) {
      if (char === '"') {
        if (line[i + 1] === '"') {
          current += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        current += char;
      }
      continue;
    }

    if (char === '"' && cellStart) {
      inQuotes = true;
      cellStart = false;
    } else if (char === delimiter) {
      cells.push(current);
      current = '';
      cellStart = true;
    } else {
      current += char;
      cellStart = false;
    }
  }

  if (inQuotes) {
    return null;
  }
  cells.push(current);
  return cells;
}

/**
 * Build the header from the first row, dropping leading index columns such as
 * the blank or "Unnamed: 0" column a DataFrame export writes.
 */
export function resolveHeader(cells: string[]): CsvHeader {
  const names = cells.map(cell => cell.trim());
  let skip = 0;
  while (skip < names.length - 1 && INDEX_COLUMN.test(names[skip])) {
    skip++;
  }
  return {
    columns: names.slice(skip),
    skip,
    width: names.length,
  };
}

/**
 * Map row cells onto header columns. Blank cells become null.
 */
export function toRecord(header: CsvHeader, cells: string[]): CsvRecord {
  const record: CsvRecord = {};
  header.columns.forEach((column, index) => {
    const value = cells[index + header.skip].trim();
    record[column] = value === '' ? null : value;
  });
  return record;
}
