// Public surface of the reconciliation pipeline, consumed by reporting tools

export * from './types/extracts';
export * from './types/tables';
export { FileSetOptions, loadCategory, loadFileSet, matchCategoryFiles } from './services/file-set-loader';
export { buildOptionUniverse, checkContractIdentity, dedupeContracts, dedupeFirst } from './services/option-universe';
export {
  countOrphans,
  joinObservations,
  joinSnapshotObservations,
  joinStreamObservations,
} from './services/observation-joiner';
export { buildStockPriceRegistry, StockPriceRegistry } from './services/stock-price-registry';
export { aggregateStreams } from './services/stream-aggregator';
export {
  computeMoneyness,
  MoneynessBreakdown,
  MoneynessExclusion,
  MoneynessResult,
  MoneynessSummary,
  moneynessOf,
  summarizeMoneyness,
} from './services/moneyness-engine';
export { centeredRanks, rankContracts } from './services/rank-normalizer';
export {
  freezeTable,
  reconcile,
  ReconciliationDiagnostics,
  ReconciliationResult,
  ReconciliationTables,
  runReconciliation,
  Table,
} from './services/reconciliation-pipeline';
export { buildConfig, Config } from './config';
