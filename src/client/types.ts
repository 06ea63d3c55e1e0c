/**
 * Control-plane API Types
 * Shapes returned by the mihomo external controller.
 */

export interface VersionInfo {
  version: string;
  meta?: boolean;
  premium?: boolean;
}

export interface DelayHistory {
  time: string;
  delay: number;
}

export interface ProxyInfo {
  name: string;
  type: string;
  /** Selected member, for groups */
  now?: string;
  /** Members, for groups */
  all?: string[];
  history: DelayHistory[];
  udp?: boolean;
  alive?: boolean;
}

export interface ProxyGroup {
  name: string;
  type: string;
  now: string;
  all: string[];
}

export interface ConnectionMetadata {
  network: string;
  type: string;
  sourceIP: string;
  destinationIP: string;
  sourcePort: string;
  destinationPort: string;
  host: string;
  process?: string;
  [key: string]: unknown;
}

export interface Connection {
  id: string;
  metadata: ConnectionMetadata;
  upload: number;
  download: number;
  start: string;
  chains: string[];
  rule: string;
  rulePayload: string;
}

export interface ConnectionsSnapshot {
  downloadTotal: number;
  uploadTotal: number;
  connections: Connection[];
  memory?: number;
}

/** Bytes per second since the previous sample */
export interface TrafficSample {
  up: number;
  down: number;
}

export interface MemorySample {
  inuse: number;
  oslimit: number;
}

export type LogLevel = 'debug' | 'info' | 'warning' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warning', 'error'];

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export interface LogEntry {
  type: LogLevel;
  payload: string;
}

export type StreamKind = 'log' | 'traffic' | 'memory';
