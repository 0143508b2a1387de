import { AppError, ExtractCategory, ResultAsync } from '@optionlens/shared';
import { FileSet } from '../types/extracts';
import {
  Contract,
  IdentityReport,
  JoinedObservation,
  JoinedSnapshotObservation,
  JoinedStreamObservation,
  MoneynessRecord,
  RankedContract,
  StreamAggregate,
} from '../types/tables';
import { pipelineLogger } from '../utils/logger';
import { FileSetOptions, loadFileSet } from './file-set-loader';
import { computeMoneyness, MoneynessExclusion, MoneynessSummary, summarizeMoneyness } from './moneyness-engine';
import { countOrphans, joinSnapshotObservations, joinStreamObservations } from './observation-joiner';
import { buildOptionUniverse, checkContractIdentity } from './option-universe';
import { rankContracts } from './rank-normalizer';
import { buildStockPriceRegistry, StockPriceRegistry } from './stock-price-registry';
import { aggregateStreams } from './stream-aggregator';

export type Table<T> = ReadonlyArray<Readonly<T>>;

export interface ReconciliationTables {
  universe: Table<Contract>;
  streams: Table<JoinedStreamObservation>;
  snapshots: Table<JoinedSnapshotObservation>;
  prices: StockPriceRegistry;
  streamAggregates: Table<StreamAggregate>;
  moneyness: Table<MoneynessRecord>;
  ranked: Table<RankedContract>;
}

export interface ReconciliationDiagnostics {
  rowCounts: Record<ExtractCategory, number>;
  identity: IdentityReport;
  orphanStreams: number;
  orphanSnapshots: number;
  moneynessExcluded: Record<MoneynessExclusion, number>;
}

export interface ReconciliationResult {
  tables: ReconciliationTables;
  diagnostics: ReconciliationDiagnostics;
  summary: MoneynessSummary;
}

function rowCounts(fileSet: FileSet): Record<ExtractCategory, number> {
  return {
    stream: fileSet.stream.length,
    snapshot: fileSet.snapshot.length,
    option_space: fileSet.option_space.length,
    stock_prices: fileSet.stock_prices.length,
    stock_options: fileSet.stock_options.length,
    moneyness_prices: fileSet.moneyness_prices.length,
  };
}

/**
 * Freeze a table and every row in it.
 */
export function freezeTable<T extends object>(rows: readonly T[]): Table<T> {
  return Object.freeze(rows.map(row => Object.freeze(row)));
}

function freezeJoined<T extends object>(rows: readonly JoinedObservation<T>[]): Table<JoinedObservation<T>> {
  for (const row of rows) {
    if (row.contract) {
      Object.freeze(row.contract);
    }
  }
  return freezeTable(rows);
}

/**
 * Derive every analytical table from a loaded file set. Each stage takes its
 * inputs explicitly and returns a new table.
 */
export function reconcile(fileSet: FileSet): ReconciliationResult {
  const universe = freezeTable(buildOptionUniverse(fileSet.option_space));
  pipelineLogger.stageCompleted('option_universe', universe.length, { rawRows: fileSet.option_space.length });

  const identity = checkContractIdentity([...fileSet.option_space, ...fileSet.stock_options]);
  pipelineLogger.identityViolations(
    identity.violations.length,
    identity.violations.map(violation => violation.contract_id)
  );

  const streams = freezeJoined(joinStreamObservations(fileSet.stream, universe));
  const snapshots = freezeJoined(joinSnapshotObservations(fileSet.snapshot, universe));
  const orphanStreams = countOrphans(streams);
  const orphanSnapshots = countOrphans(snapshots);
  pipelineLogger.stageCompleted('stream_join', streams.length, { orphans: orphanStreams });
  pipelineLogger.stageCompleted('snapshot_join', snapshots.length, { orphans: orphanSnapshots });

  const prices = buildStockPriceRegistry([...fileSet.stock_prices, ...fileSet.moneyness_prices]);
  pipelineLogger.stageCompleted('stock_price_registry', prices.size);

  const streamAggregates = freezeTable(aggregateStreams(streams, universe));
  pipelineLogger.stageCompleted('stream_aggregate', streamAggregates.length);

  const { records, excluded } = computeMoneyness(universe, prices, streamAggregates);
  const moneyness = freezeTable(records);
  pipelineLogger.stageCompleted('moneyness', moneyness.length, { excluded });

  const ranked = freezeTable(rankContracts(universe));
  pipelineLogger.stageCompleted('rank_normalizer', ranked.length);

  return {
    tables: {
      universe,
      streams,
      snapshots,
      prices,
      streamAggregates,
      moneyness,
      ranked,
    },
    diagnostics: {
      rowCounts: rowCounts(fileSet),
      identity,
      orphanStreams,
      orphanSnapshots,
      moneynessExcluded: excluded,
    },
    summary: summarizeMoneyness(moneyness),
  };
}

/**
 * Load a data directory and reconcile it. A load failure in any category fails
 * the whole run.
 */
export function runReconciliation(options: FileSetOptions): ResultAsync<ReconciliationResult, AppError> {
  return loadFileSet(options).map(reconcile);
}
