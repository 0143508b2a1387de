import { normalizeContractType, toCalendarDate } from '@optionlens/shared';
import { OptionSpaceRow, StockOptionRow } from '../types/extracts';
import { Contract, IdentityReport, IdentityViolation } from '../types/tables';

/**
 * Keep the first row seen for each key, preserving input order.
 */
export function dedupeFirst<T>(rows: readonly T[], keyOf: (row: T) => string): T[] {
  const seen = new Set<string>();
  const kept: T[] = [];
  for (const row of rows) {
    const key = keyOf(row);
    if (!seen.has(key)) {
      seen.add(key);
      kept.push(row);
    }
  }
  return kept;
}

export function toContract(row: OptionSpaceRow): Contract {
  return {
    id: row.id,
    description: row.description,
    exercise_style: row.exercise_style,
    exchange_id: row.exchange_id,
    expiry_date: toCalendarDate(row.expiry_date),
    contract_type: normalizeContractType(row.contract_type),
    strike_price: row.strike_price,
    underlying_id: row.underlying_id,
    source_file: row.source_file,
  };
}

/**
 * Deduplicate contracts by id. Later sightings of an id are dropped.
 */
export function dedupeContracts(contracts: readonly Contract[]): Contract[] {
  return dedupeFirst(contracts, contract => contract.id);
}

/**
 * Build the canonical contract universe from the option-space extract rows,
 * which must already be in file-arrival order.
 */
export function buildOptionUniverse(rows: readonly OptionSpaceRow[]): Contract[] {
  return dedupeContracts(rows.map(toContract));
}

type DescribedRow = Pick<OptionSpaceRow | StockOptionRow, 'id' | 'description' | 'source_file'>;

/**
 * Report every contract id that was seen with more than one description.
 * Rows without a description take no part in the comparison.
 */
export function checkContractIdentity(rows: readonly DescribedRow[]): IdentityReport {
  const descriptionsById = new Map<string, { descriptions: string[]; files: string[] }>();

  for (const row of rows) {
    let entry = descriptionsById.get(row.id);
    if (!entry) {
      entry = { descriptions: [], files: [] };
      descriptionsById.set(row.id, entry);
    }
    if (row.description === null) {
      continue;
    }
    if (!entry.descriptions.includes(row.description)) {
      entry.descriptions.push(row.description);
    }
    if (!entry.files.includes(row.source_file)) {
      entry.files.push(row.source_file);
    }
  }

  const violations: IdentityViolation[] = [];
  for (const [contractId, entry] of descriptionsById) {
    if (entry.descriptions.length > 1) {
      violations.push({
        contract_id: contractId,
        descriptions: entry.descriptions,
        source_files: entry.files,
      });
    }
  }

  return {
    checked_ids: descriptionsById.size,
    violations,
  };
}
