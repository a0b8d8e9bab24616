export type {
  EventCategory,
  Snapshot,
  RawInputEvent,
  KeyState,
  ClassifiedEvent,
  InputSource,
  LoggerLike,
  AgentConfig,
  AgentStats,
} from './core';
export type {
  CounterRow,
  SyncMetadata,
  IStatsStore,
  ISnapshotTransport,
} from './provider';
export type {
  IngestResponse,
  StatsEntry,
  StatsResponse,
  HealthResponse,
  ErrorResponse,
} from './api';
