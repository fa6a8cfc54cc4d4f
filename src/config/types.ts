import type { LogLevel } from '../observability/logger.js';
import type { FaultConfig } from '../faults/types.js';

export type Mode = 'sender' | 'receiver';

export const MODES: readonly Mode[] = ['sender', 'receiver'];

export interface RateConfig {
  requestsPerSecond: number;
  startDelayMs: number;
  /** 0 disables the per-request timeout. */
  requestTimeoutMs: number;
}

export interface SenderConfig extends RateConfig {
  receiverHost: string;
  receiverPort: number;
  /** 0 leaves dispatch concurrency unbounded. */
  maxInflight: number;
}

export interface AppConfig {
  mode: Mode;
  logLevel: LogLevel;
  receiverPort: number;
  senderPort: number;
  shutdownGraceMs: number;
  sender: SenderConfig;
  receiver: FaultConfig;
}
