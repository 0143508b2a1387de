// Explicit row schemas for each extract category. File name patterns only route
// files to a category; the row shape always comes from here.

import { z } from 'zod';
import { ExtractCategory, toCalendarDate, toTimestamp } from '@optionlens/shared';

/**
 * A raw cell after CSV tokenizing. Empty cells arrive as null and columns a file
 * does not carry arrive as undefined.
 */
const cell = z.string().nullish().transform(value => value ?? null);

const text = cell;

const requiredText = z.string({ required_error: 'Required', invalid_type_error: 'Required' }).trim().min(1, 'Required');

const number = cell.transform((value, ctx) => {
  if (value === null) {
    return null;
  }
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Expected a number, received "${value}"` });
    return z.NEVER;
  }
  return parsed;
});

// Date columns keep their raw spelling here; the builders normalize them.
const dateText = cell.refine(value => value === null || toCalendarDate(value) !== null, {
  message: 'Expected a date',
});

const requiredDateText = requiredText.refine(value => toCalendarDate(value) !== null, {
  message: 'Expected a date',
});

const timestamp = cell.transform((value, ctx) => {
  if (value === null) {
    return null;
  }
  const parsed = toTimestamp(value);
  if (!parsed) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Expected a timestamp, received "${value}"` });
    return z.NEVER;
  }
  return parsed;
});

export const optionSpaceRowSchema = z.object({
  id: requiredText,
  description: text,
  exercise_style: text,
  exchange_id: text,
  expiry_date: dateText,
  contract_type: text,
  strike_price: number,
  underlying_id: text,
});

export const stockOptionRowSchema = z.object({
  id: requiredText,
  description: text,
  underlying_id: text,
  exercise_style: text,
  open_interest: number,
});

export const streamRowSchema = z.object({
  contract_id: requiredText,
  observed_at: timestamp,
  ask: number,
  ask_size: number,
  bid: number,
  bid_size: number,
  mid: number,
});

export const snapshotRowSchema = z.object({
  contract_id: requiredText,
  mid_price: number,
  asset_type: text,
});

export const priceRowSchema = z.object({
  underlying_id: requiredText,
  date: requiredDateText,
  close: number,
  volume: number,
});

export const extractSchemas = {
  stream: streamRowSchema,
  snapshot: snapshotRowSchema,
  option_space: optionSpaceRowSchema,
  stock_prices: priceRowSchema,
  stock_options: stockOptionRowSchema,
  moneyness_prices: priceRowSchema,
} satisfies Record<ExtractCategory, z.ZodTypeAny>;

export type ExtractSchemas = typeof extractSchemas;

export interface SourceTagged {
  source_file: string;
}

export type ExtractRow<C extends ExtractCategory> = z.output<ExtractSchemas[C]> & SourceTagged;

export type OptionSpaceRow = ExtractRow<'option_space'>;
export type StockOptionRow = ExtractRow<'stock_options'>;
export type StreamRow = ExtractRow<'stream'>;
export type SnapshotRow = ExtractRow<'snapshot'>;
export type PriceRow = ExtractRow<'stock_prices'>;

export type FileSet = {
  readonly [C in ExtractCategory]: readonly ExtractRow<C>[];
};
