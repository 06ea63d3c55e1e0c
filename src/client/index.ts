export {
  ControlPlaneClient,
  DEFAULT_DELAY_TEST_URL,
  DEFAULT_DELAY_TIMEOUT_MS,
  LOG_CHANNEL_CAPACITY,
  SAMPLE_CHANNEL_CAPACITY,
  logLevelRank,
  toWebSocketUrl,
} from './control-plane-client';
export type {
  ControlPlaneClientOptions,
  RequestOptions,
  DelayTestOptions,
  LogSubscriptionOptions,
  StreamOptions,
} from './control-plane-client';
export { Subscription, DEFAULT_RECONNECT_POLICY, reconnectDelay } from './subscription';
export type { ReconnectPolicy, SubscriptionOptions } from './subscription';
export {
  autoSelectFastest,
  batchTestDelays,
  sortDelayResults,
  DEFAULT_BATCH_CONCURRENCY,
  DEFAULT_MAX_DELAY_MS,
} from './proxy-selection';
export type {
  DelayResult,
  BatchTestOptions,
  AutoSelectOptions,
  AutoSelectResult,
} from './proxy-selection';
export { BoundedChannel } from './bounded-channel';
export type { OverflowPolicy } from './bounded-channel';
export { LOG_LEVELS, isLogLevel } from './types';
export type {
  VersionInfo,
  DelayHistory,
  ProxyInfo,
  ProxyGroup,
  ConnectionMetadata,
  Connection,
  ConnectionsSnapshot,
  TrafficSample,
  MemorySample,
  LogLevel,
  LogEntry,
  StreamKind,
} from './types';
