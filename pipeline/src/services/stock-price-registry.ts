import { CalendarDate, toCalendarDate } from '@optionlens/shared';
import { PriceRow } from '../types/extracts';
import { UnderlyingDailyPrice } from '../types/tables';

/**
 * Daily closes and volumes per underlying, unique per (underlying, calendar date).
 */
export class StockPriceRegistry {
  readonly rows: readonly UnderlyingDailyPrice[];
  private readonly byUnderlying = new Map<string, Map<CalendarDate, UnderlyingDailyPrice>>();

  constructor(prices: readonly UnderlyingDailyPrice[]) {
    const kept: UnderlyingDailyPrice[] = [];
    for (const price of prices) {
      let byDate = this.byUnderlying.get(price.underlying_id);
      if (!byDate) {
        byDate = new Map();
        this.byUnderlying.set(price.underlying_id, byDate);
      }
      // First occurrence wins
      if (!byDate.has(price.date)) {
        byDate.set(price.date, price);
        kept.push(price);
      }
    }
    this.rows = kept;
  }

  lookup(underlyingId: string | null, date: CalendarDate | null): UnderlyingDailyPrice | null {
    if (underlyingId === null || date === null) {
      return null;
    }
    return this.byUnderlying.get(underlyingId)?.get(date) ?? null;
  }

  get size(): number {
    return this.rows.length;
  }
}

export function toDailyPrice(row: PriceRow): UnderlyingDailyPrice | null {
  const date = toCalendarDate(row.date);
  if (date === null) {
    return null;
  }
  return {
    underlying_id: row.underlying_id,
    date,
    close: row.close,
    volume: row.volume,
    source_file: row.source_file,
  };
}

/**
 * Build the registry from raw price rows in file-arrival order. Dates are
 * normalized before deduplication so two spellings of one day collapse to the first.
 */
export function buildStockPriceRegistry(rows: readonly PriceRow[]): StockPriceRegistry {
  const prices: UnderlyingDailyPrice[] = [];
  for (const row of rows) {
    const price = toDailyPrice(row);
    if (price) {
      prices.push(price);
    }
  }
  return new StockPriceRegistry(prices);
}
