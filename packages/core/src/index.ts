export { TallyAgent } from './agent';
export { Aggregator } from './aggregator';
export { FileSpool, DEFAULT_SPOOL_PATH } from './spool';
export type { SpoolOptions } from './spool';
export {
  categorize,
  classify,
  keyName,
  buttonName,
  scrollNotches,
  NOTCH_SIZE,
} from './classifier';
export {
  snapshotSchema,
  parseSnapshot,
  freezeSnapshot,
} from './snapshot';
export { Logger, describeError } from './logger';
export type { LogLevel, LogSink } from './logger';
export { setupSignalHandlers } from './signals';
export { loadLayeredConfig, envPath, toInt, toBool, toList } from './config';
export type { EnvSetter, LayeredConfigOptions, RawConfig } from './config';
export type { ShutdownContext } from './signals';

// Re-export types consumers need
export type {
  AgentConfig,
  AgentStats,
  ClassifiedEvent,
  EventCategory,
  InputSource,
  ISnapshotTransport,
  LoggerLike,
  RawInputEvent,
  Snapshot,
} from '@inputtally/types';
