// ============================================================================
// SHARED TYPES
// ============================================================================

export type ContractType = 'Call' | 'Put';

/**
 * Calendar date in YYYY-MM-DD form, used as an exact-match join key
 */
export type CalendarDate = string;

export type ExtractCategory =
  | 'stream'
  | 'snapshot'
  | 'option_space'
  | 'stock_prices'
  | 'stock_options'
  | 'moneyness_prices';

export const EXTRACT_CATEGORIES: readonly ExtractCategory[] = [
  'stream',
  'snapshot',
  'option_space',
  'stock_prices',
  'stock_options',
  'moneyness_prices',
];

export interface CategoryPattern {
  category: ExtractCategory;
  pattern: RegExp;
}

export function isContractType(value: unknown): value is ContractType {
  return value === 'Call' || value === 'Put';
}

/**
 * Map "call"/"put" in any casing onto the canonical contract type.
 * Anything else is passed through trimmed so it can be reported and excluded later.
 */
export function normalizeContractType(raw: string | null): string | null {
  if (raw === null) {
    return null;
  }
  const trimmed = raw.trim();
  if (!trimmed) {
    return null;
  }
  switch (trimmed.toLowerCase()) {
    case 'call':
      return 'Call';
    case 'put':
      return 'Put';
    default:
      return trimmed;
  }
}
