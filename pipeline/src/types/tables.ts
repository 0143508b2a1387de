// Canonical and derived table schemas

import { CalendarDate } from '@optionlens/shared';
import { SnapshotRow, StreamRow } from './extracts';

export interface Contract {
  id: string;
  description: string | null;
  exercise_style: string | null;
  exchange_id: string | null;
  expiry_date: CalendarDate | null;
  // 'Call' | 'Put' once normalized, otherwise the raw text from the extract
  contract_type: string | null;
  strike_price: number | null;
  underlying_id: string | null;
  source_file: string;
}

export interface UnderlyingDailyPrice {
  underlying_id: string;
  date: CalendarDate;
  close: number | null;
  volume: number | null;
  source_file: string;
}

export type StreamObservation = StreamRow;
export type SnapshotObservation = SnapshotRow;

export type JoinedObservation<T> = T & {
  contract: Contract | null;
};

export type JoinedStreamObservation = JoinedObservation<StreamObservation>;
export type JoinedSnapshotObservation = JoinedObservation<SnapshotObservation>;

export interface StreamAggregate {
  contract_id: string;
  observation_count: number;
  mean_ask_size: number | null;
  mean_bid_size: number | null;
  mean_ask: number | null;
  mean_bid: number | null;
}

export interface MoneynessRecord {
  contract_id: string;
  contract_type: 'Call' | 'Put';
  strike_price: number;
  expiry_date: CalendarDate;
  underlying_id: string;
  close_on_expiry: number;
  volume_on_expiry: number | null;
  observation_count: number;
  mean_ask_size: number | null;
  mean_bid_size: number | null;
  mean_ask: number | null;
  mean_bid: number | null;
  moneyness: number;
}

export interface RankedContract {
  contract_id: string;
  underlying_id: string | null;
  contract_type: string | null;
  expiry_date: CalendarDate | null;
  strike_price: number | null;
  strike_rank: number | null;
  expiry_rank: number | null;
}

export interface IdentityViolation {
  contract_id: string;
  descriptions: string[];
  source_files: string[];
}

export interface IdentityReport {
  checked_ids: number;
  violations: IdentityViolation[];
}
