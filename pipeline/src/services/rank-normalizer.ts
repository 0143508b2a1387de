import { Contract, RankedContract } from '../types/tables';

type Rankable = number | string;

interface RankSpec<T> {
  // Group key parts; a null part keeps the row out of every group
  groupBy: (row: T) => Array<string | null>;
  value: (row: T) => Rankable | null;
}

function compare(a: Rankable, b: Rankable): number {
  if (a < b) {
    return -1;
  }
  return a > b ? 1 : 0;
}

export function median(values: readonly number[]): number {
  const sorted = [...values].sort((a, b) => a - b);
  const middle = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 1 ? sorted[middle] : (sorted[middle - 1] + sorted[middle]) / 2;
}

/**
 * Rank each row ascending within its group, then shift the group so that the
 * floor of its median rank lands on zero.
 *
 * Ranks start at 1 and ties are broken by input order, so every rank in a group
 * is distinct. Rows without a full group key or a value get null.
 */
export function centeredRanks<T>(rows: readonly T[], spec: RankSpec<T>): Array<number | null> {
  const ranks: Array<number | null> = rows.map(() => null);
  const groups = new Map<string, Array<{ index: number; value: Rankable }>>();

  rows.forEach((row, index) => {
    const parts = spec.groupBy(row);
    const value = spec.value(row);
    if (value === null || parts.some(part => part === null)) {
      return;
    }
    const key = JSON.stringify(parts);
    let members = groups.get(key);
    if (!members) {
      members = [];
      groups.set(key, members);
    }
    members.push({ index, value });
  });

  for (const members of groups.values()) {
    // Array.prototype.sort is stable, which gives the first-appearance tie-break
    const ordered = [...members].sort((a, b) => compare(a.value, b.value));
    const groupRanks = ordered.map((_, position) => position + 1);
    const center = Math.floor(median(groupRanks));
    ordered.forEach((member, position) => {
      ranks[member.index] = groupRanks[position] - center;
    });
  }

  return ranks;
}

/**
 * Strike rank within (underlying, type, expiry) and expiry rank within
 * (underlying, type), both centered on their group median.
 */
export function rankContracts(universe: readonly Contract[]): RankedContract[] {
  const strikeRanks = centeredRanks(universe, {
    groupBy: contract => [contract.underlying_id, contract.contract_type, contract.expiry_date],
    value: contract => contract.strike_price,
  });
  const expiryRanks = centeredRanks(universe, {
    groupBy: contract => [contract.underlying_id, contract.contract_type],
    value: contract => contract.expiry_date,
  });

  return universe.map((contract, index) => ({
    contract_id: contract.id,
    underlying_id: contract.underlying_id,
    contract_type: contract.contract_type,
    expiry_date: contract.expiry_date,
    strike_price: contract.strike_price,
    strike_rank: strikeRanks[index],
    expiry_rank: expiryRanks[index],
  }));
}
