import {
  Contract,
  JoinedObservation,
  JoinedSnapshotObservation,
  JoinedStreamObservation,
  SnapshotObservation,
  StreamObservation,
} from '../types/tables';

export function indexContracts(universe: readonly Contract[]): Map<string, Contract> {
  const index = new Map<string, Contract>();
  for (const contract of universe) {
    if (!index.has(contract.id)) {
      index.set(contract.id, contract);
    }
  }
  return index;
}

/**
 * Left-join observations onto the universe by contract id. Observations with no
 * matching contract are kept with a null contract. Each joined row carries its
 * own copy of the contract.
 */
export function joinObservations<T extends { contract_id: string }>(
  observations: readonly T[],
  universe: readonly Contract[]
): JoinedObservation<T>[] {
  const index = indexContracts(universe);
  return observations.map(observation => {
    const contract = index.get(observation.contract_id);
    return {
      ...observation,
      contract: contract ? { ...contract } : null,
    };
  });
}

export function joinStreamObservations(
  observations: readonly StreamObservation[],
  universe: readonly Contract[]
): JoinedStreamObservation[] {
  return joinObservations(observations, universe);
}

export function joinSnapshotObservations(
  observations: readonly SnapshotObservation[],
  universe: readonly Contract[]
): JoinedSnapshotObservation[] {
  return joinObservations(observations, universe);
}

export function countOrphans(rows: readonly JoinedObservation<unknown>[]): number {
  return rows.filter(row => row.contract === null).length;
}
