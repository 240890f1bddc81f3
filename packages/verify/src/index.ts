/**
 * @regbus/verify
 *
 * Constrained-random verification of a register-access SPI bus: frame
 * codec, driver and monitor, stimulus generation, functional coverage,
 * scoreboard and the test bench loop that ties them together.
 */

// Errors
export {
  TransactionError,
  ProtocolError,
  ScoreboardMismatchError,
  WatchdogTimeoutError,
  RegisterMapError,
  ConfigError,
  CoverageError,
} from "./errors.js";
export type { ProtocolViolation, Mismatch } from "./errors.js";

// Logging, configuration, randomness
export { createLogger, consoleSink, formatLogRecord, isLogLevel, silentLogger, LOG_LEVELS } from "./logger.js";
export type { Logger, LoggerOptions, LogLevel, LogRecord, LogSink } from "./logger.js";
export { loadBenchConfig, watchdogBudget, DEFAULT_BENCH_CONFIG } from "./config.js";
export type { BenchConfig } from "./config.js";
export { createRandom } from "./random.js";
export type { Random } from "./random.js";

// Registers and transactions
export {
  REGISTER_MAP_SCHEMA,
  chipIdValue,
  expandRegisterMap,
  loadRegisterMap,
  parseRegisterMap,
} from "./register-map.js";
export type { AccessMode, RegisterDefinition, RegisterMap, RegisterMapEntry } from "./register-map.js";
export { RegisterModel } from "./register-model.js";
export type { AccessShortfall, RegisterEntry, RegisterModelOptions } from "./register-model.js";
export {
  DATA_RANGE_CLASSES,
  DIRECTIONS,
  checkTransaction,
  formatTransaction,
  transactionField,
} from "./transaction.js";
export type { DataRangeClass, Direction, Transaction, TransactionField } from "./transaction.js";

// Frames and bus agents
export {
  FRAME_BITS,
  REQUEST_LAYOUT,
  RESPONSE_LAYOUT,
  bitsToWord,
  extractField,
  fieldAt,
  packFields,
  packRequest,
  packResponse,
  unpackRequest,
  unpackResponse,
  wordToBits,
} from "./frame.js";
export type { Bit, FrameField, RequestFrame, ResponseFrame, ResponseStatus } from "./frame.js";
export { halfPeriodForFrequency, resolveSpiConfig, spiPortSignals, spiSignalNames } from "./spi-config.js";
export type { ResolvedSpiConfig, SpiConfig, SpiSignalNames } from "./spi-config.js";
export { SpiDriver } from "./spi-driver.js";
export type { SpiDriverOptions } from "./spi-driver.js";
export { SpiMonitor } from "./spi-monitor.js";
export type { MonitorState, ObservationListener, SpiMonitorOptions, SpiObservation } from "./spi-monitor.js";
export { SpiRegisterDevice } from "./device-model.js";
export type { DeviceFaults, SpiRegisterDeviceOptions } from "./device-model.js";
export { PulseInjector } from "./pulse.js";
export type { PulseOptions } from "./pulse.js";

// Stimulus
export { solveVariable, survivors } from "./constraints.js";
export type { RandomVariable } from "./constraints.js";
export { Sequencer, StimulusGenerator, deriveData } from "./stimulus.js";
export type { SequencerOptions, StimulusOptions } from "./stimulus.js";

// Coverage
export { CoverCross, CoverPoint, CoverageRegistry, STATUS_FIELDS, fieldEquals, isStatusField } from "./coverage.js";
export type { Bin, BinTuple, CoverItem, IgnorePattern, StatusField, StatusValue } from "./coverage.js";
export { CoverageEngine, formatCoverageReport, formatStatusValue } from "./coverage-engine.js";
export type {
  BinReport,
  CoverItemReport,
  CoverageEngineOptions,
  CoverageReport,
  StatusReportConfig,
} from "./coverage-engine.js";
export { defineSpiCoverage } from "./spi-coverage.js";
export type { SpiCoverage, SpiCoverageOptions } from "./spi-coverage.js";

// Scoring and orchestration
export { ANY, ResetDetector, Scoreboard, defaultCompare } from "./scoreboard.js";
export type {
  Comparator,
  Expectation,
  Observation,
  ResetDetectorOptions,
  ScoreboardMode,
  ScoreboardOptions,
  ScoreboardResult,
} from "./scoreboard.js";
export { TestBench, runTestBench } from "./testbench.js";
export type { TestBenchOptions, Verdict, WatchdogBudget } from "./testbench.js";
