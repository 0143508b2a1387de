import { ContractType, isContractType } from '@optionlens/shared';
import { Contract, MoneynessRecord, StreamAggregate } from '../types/tables';
import { StockPriceRegistry } from './stock-price-registry';
import { emptyAggregate } from './stream-aggregator';

/**
 * Signed profitability of a contract held to expiry against the underlying close.
 * A call and a put at the same strike get the same magnitude with opposite signs.
 */
export function moneynessOf(contractType: ContractType, close: number, strike: number): number {
  return contractType === 'Call' ? close - strike : strike - close;
}

export type MoneynessExclusion = 'no_price_on_expiry' | 'unrecognized_contract_type' | 'missing_close_or_strike';

export interface MoneynessResult {
  records: MoneynessRecord[];
  excluded: Record<MoneynessExclusion, number>;
}

/**
 * Join contracts to the underlying close on their expiry date and to their stream
 * aggregate, then compute moneyness.
 *
 * Contracts with no price on expiry are dropped. Contracts whose type is neither
 * Call nor Put, or that lack a close or a strike, have no moneyness and are
 * dropped too. Each reason is counted in `excluded`.
 */
export function computeMoneyness(
  universe: readonly Contract[],
  prices: StockPriceRegistry,
  aggregates: readonly StreamAggregate[]
): MoneynessResult {
  const aggregateById = new Map<string, StreamAggregate>();
  for (const aggregate of aggregates) {
    if (!aggregateById.has(aggregate.contract_id)) {
      aggregateById.set(aggregate.contract_id, aggregate);
    }
  }

  const excluded: Record<MoneynessExclusion, number> = {
    no_price_on_expiry: 0,
    unrecognized_contract_type: 0,
    missing_close_or_strike: 0,
  };
  const records: MoneynessRecord[] = [];

  for (const contract of universe) {
    const { underlying_id: underlyingId, expiry_date: expiryDate } = contract;
    const price = prices.lookup(underlyingId, expiryDate);
    if (!price || underlyingId === null || expiryDate === null) {
      excluded.no_price_on_expiry++;
      continue;
    }

    const contractType = contract.contract_type;
    if (!isContractType(contractType)) {
      excluded.unrecognized_contract_type++;
      continue;
    }

    if (price.close === null || contract.strike_price === null) {
      excluded.missing_close_or_strike++;
      continue;
    }

    const aggregate = aggregateById.get(contract.id) ?? emptyAggregate(contract.id);

    records.push({
      contract_id: contract.id,
      contract_type: contractType,
      strike_price: contract.strike_price,
      expiry_date: expiryDate,
      underlying_id: underlyingId,
      close_on_expiry: price.close,
      volume_on_expiry: price.volume,
      observation_count: aggregate.observation_count,
      mean_ask_size: aggregate.mean_ask_size,
      mean_bid_size: aggregate.mean_bid_size,
      mean_ask: aggregate.mean_ask,
      mean_bid: aggregate.mean_bid,
      moneyness: moneynessOf(contractType, price.close, contract.strike_price),
    });
  }

  return { records, excluded };
}

export interface MoneynessBreakdown {
  contracts: number;
  in_the_money: number;
  at_the_money: number;
  out_of_the_money: number;
  monitored: number;
  mean_moneyness: number | null;
}

export interface MoneynessSummary {
  overall: MoneynessBreakdown;
  byType: Record<ContractType, MoneynessBreakdown>;
}

function breakdown(records: readonly MoneynessRecord[]): MoneynessBreakdown {
  const total = records.reduce((sum, record) => sum + record.moneyness, 0);
  return {
    contracts: records.length,
    in_the_money: records.filter(record => record.moneyness > 0).length,
    at_the_money: records.filter(record => record.moneyness === 0).length,
    out_of_the_money: records.filter(record => record.moneyness < 0).length,
    monitored: records.filter(record => record.observation_count > 0).length,
    mean_moneyness: records.length === 0 ? null : total / records.length,
  };
}

/**
 * How often buying each contract and holding it to expiry would have paid off.
 */
export function summarizeMoneyness(records: readonly MoneynessRecord[]): MoneynessSummary {
  return {
    overall: breakdown(records),
    byType: {
      Call: breakdown(records.filter(record => record.contract_type === 'Call')),
      Put: breakdown(records.filter(record => record.contract_type === 'Put')),
    },
  };
}
