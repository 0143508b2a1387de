import { Contract, StreamAggregate, StreamObservation } from '../types/tables';

interface Accumulator {
  count: number;
  sum: number;
}

interface ContractAccumulator {
  heartbeats: number;
  ask: Accumulator;
  bid: Accumulator;
  askSize: Accumulator;
  bidSize: Accumulator;
}

function emptyAccumulator(): ContractAccumulator {
  return {
    heartbeats: 0,
    ask: { count: 0, sum: 0 },
    bid: { count: 0, sum: 0 },
    askSize: { count: 0, sum: 0 },
    bidSize: { count: 0, sum: 0 },
  };
}

function add(accumulator: Accumulator, value: number | null): void {
  if (value === null) {
    return;
  }
  accumulator.count++;
  accumulator.sum += value;
}

function mean(accumulator: Accumulator): number | null {
  return accumulator.count === 0 ? null : accumulator.sum / accumulator.count;
}

export function emptyAggregate(contractId: string): StreamAggregate {
  return {
    contract_id: contractId,
    observation_count: 0,
    mean_ask_size: null,
    mean_bid_size: null,
    mean_ask: null,
    mean_bid: null,
  };
}

/**
 * Reduce stream observations to one aggregate per contract id.
 *
 * `observation_count` counts heartbeat updates, i.e. observations where both the
 * ask and the bid price are absent. Priced ticks only feed the means, and every
 * mean skips null values. Universe contracts that never appear in the stream are
 * appended afterwards with a zero count and null means.
 */
export function aggregateStreams(
  observations: readonly StreamObservation[],
  universe: readonly Contract[]
): StreamAggregate[] {
  const byContract = new Map<string, ContractAccumulator>();

  for (const observation of observations) {
    let accumulator = byContract.get(observation.contract_id);
    if (!accumulator) {
      accumulator = emptyAccumulator();
      byContract.set(observation.contract_id, accumulator);
    }
    if (observation.ask === null && observation.bid === null) {
      accumulator.heartbeats++;
    }
    add(accumulator.ask, observation.ask);
    add(accumulator.bid, observation.bid);
    add(accumulator.askSize, observation.ask_size);
    add(accumulator.bidSize, observation.bid_size);
  }

  const aggregates: StreamAggregate[] = [];
  for (const [contractId, accumulator] of byContract) {
    aggregates.push({
      contract_id: contractId,
      observation_count: accumulator.heartbeats,
      mean_ask_size: mean(accumulator.askSize),
      mean_bid_size: mean(accumulator.bidSize),
      mean_ask: mean(accumulator.ask),
      mean_bid: mean(accumulator.bid),
    });
  }

  // Backfill contracts without a single observation
  for (const contract of universe) {
    if (!byContract.has(contract.id)) {
      byContract.set(contract.id, emptyAccumulator());
      aggregates.push(emptyAggregate(contract.id));
    }
  }

  return aggregates;
}
