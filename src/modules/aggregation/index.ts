/**
 * Aggregation Module Public API
 *
 * Turns individual survey responses into weighted, smoothed aggregate
 * estimates per geography and day.
 */

// ============================================================================
// Core Types
// ============================================================================

export type {
  IsoDay,
  ResponseRow,
  ResponseTable,
  StatisticKind,
  PostProcessingKind,
  GroupingDimension,
  MultiselectChoice,
  MeanIndicator,
  BinaryIndicator,
  MultiselectIndicator,
  IndicatorDefinition,
  SignalSpec,
  UnmappedPolicy,
  RunConfig,
  RunLocations,
  StandardError,
  WeightedResponse,
  StatisticBundle,
  GroupComputer,
  GroupEstimate,
  MegacountyEstimate,
  MegacountyMerge,
  Variant,
  AggregateRow,
  ExportFile,
} from './core/types.js';

export { UNDEFINED_SE, MissingCode } from './core/types.js';

// ============================================================================
// Errors
// ============================================================================

export type {
  InsufficientDataError,
  UndefinedStandardErrorWarning,
  ConfigurationError,
  ResponseLoadError,
  OutputWriteError,
  AggregationRunError,
} from './core/errors.js';

export {
  createInsufficientDataError,
  createUndefinedStandardErrorWarning,
  createConfigurationError,
  createResponseLoadError,
  createOutputWriteError,
} from './core/errors.js';

// ============================================================================
// Statistics & Post-processing
// ============================================================================

export {
  MIN_SAMPLE_SIZE_FOR_SE,
  computeWeightedMean,
  computeBinaryPercentage,
  computeStatistic,
} from './core/statistics.js';

export { applyJeffreys, postProcess } from './core/post-processing.js';

export { missingCodesFor, type MissingCodes } from './core/missingness.js';

export { adjustForWeekday } from './core/weekday.js';

// ============================================================================
// Smoothing & Megacounties
// ============================================================================

export {
  windowDays,
  outputDaySpan,
  outputDayRange,
  inputDaySpan,
  runInputSpan,
  isFullWindow,
  type DaySpan,
} from './core/smoothing.js';

export { mergeMegacountiesForDay, applyMegacounties } from './core/megacounty.js';

// ============================================================================
// Indicators & Run Configuration
// ============================================================================

export { ANY_CHOICE_LABEL, expandSignals, validateIndicators } from './core/indicators.js';

export {
  DEFAULT_CONCURRENCY,
  IndicatorParamsSchema,
  RunParamsSchema,
  toIndicatorDefinition,
  parseRunParams,
  type IndicatorParams,
  type RunParams,
} from './core/run-config.js';

export {
  RUN_STAGES,
  createRunStateMachine,
  type RunStage,
  type RunStateMachine,
} from './core/run-state.js';

export { sortRows, groupExportFiles } from './core/export-files.js';

// ============================================================================
// Ports
// ============================================================================

export type { OutputWriter } from './core/ports.js';

// ============================================================================
// Use Cases
// ============================================================================

export {
  resolveLevel,
  resolveGeographies,
  type ResolvedRow,
  type ResolvedLevel,
} from './core/usecases/resolve-geographies.js';

export {
  ADJUSTED_SUFFIX,
  planUnits,
  groupComputerFor,
  computeUnit,
  mergeUnit,
  postprocessUnit,
  type AggregationUnit,
  type UnitDiagnostics,
  type UnitComputation,
  type UnitMerge,
  type UnitOutput,
} from './core/usecases/aggregate-unit.js';

export {
  runAggregation,
  type RunAggregationDeps,
  type RunAggregationInput,
  type RunAggregationResult,
  type RunSummary,
} from './core/usecases/run-aggregation.js';

// ============================================================================
// Repositories & Writers
// ============================================================================

export { loadResponseTable, MISSING_MARKERS } from './shell/repo/csv-response-repo.js';
export { loadRunParams } from './shell/repo/params-repo.js';

export {
  createCsvExportWriter,
  exportFileName,
  formatExportFile,
  EXPORT_HEADER,
  NA,
  type CsvExportWriterOptions,
} from './shell/writer/csv-export-writer.js';
