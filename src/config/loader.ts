import { LOG_LEVELS } from '../observability/logger.js';
import { MAX_TIMER_DELAY_MS } from '../concurrency/sleep.js';
import { ConfigValidationError } from './errors.js';
import { EnvSource, readBool, readDuration, readEnum, readFloat, readInt, readString } from './env.js';
import { AppConfig, MODES } from './types.js';

const PORT_RANGE = { min: 1, max: 65535 };
// Single-timer durations; sleep-driven ones have no upper bound.
const TIMER_RANGE = { min: 0, max: MAX_TIMER_DELAY_MS };

export function loadConfig(env: EnvSource = process.env): AppConfig {
  const mode = readEnum(env, 'TCT_MODE', MODES, { required: true });
  const logLevel = readEnum(env, 'TCT_LOG_LEVEL', LOG_LEVELS, { default: 'info' });
  const receiverPort = readInt(env, 'TCT_RECEIVER_PORT', { default: 8080, ...PORT_RANGE });
  const senderPort = readInt(env, 'TCT_SENDER_PORT', { default: 8081, ...PORT_RANGE });
  const shutdownGraceMs = readDuration(env, 'TCT_SHUTDOWN_GRACE', { default: 5000, ...TIMER_RANGE });

  const requestsPerSecond = readFloat(env, 'TCT_RPS', { default: 1.0 });
  if (!(requestsPerSecond > 0) || !Number.isFinite(requestsPerSecond)) {
    throw new ConfigValidationError('TCT_RPS', `must be > 0, got ${requestsPerSecond}`);
  }

  return {
    mode,
    logLevel,
    receiverPort,
    senderPort,
    shutdownGraceMs,
    sender: {
      receiverHost: readString(env, 'TCT_RECEIVER_HOST', { default: 'localhost' }),
      receiverPort,
      requestsPerSecond,
      startDelayMs: readDuration(env, 'TCT_START_DELAY', { default: 0, min: 0 }),
      requestTimeoutMs: readDuration(env, 'TCT_REQUEST_TIMEOUT', { default: 2000, ...TIMER_RANGE }),
      maxInflight: readInt(env, 'TCT_MAX_INFLIGHT', { default: 0, min: 0 }),
    },
    receiver: {
      responseDelayMs: readDuration(env, 'TCT_RESPONSE_DELAY', { default: 0, min: 0 }),
      responseJitterMs: readDuration(env, 'TCT_RESPONSE_JITTER', { default: 0, min: 0 }),
      hangRate: readFloat(env, 'TCT_HANG_RATE', { default: 0, min: 0, max: 1 }),
      errorRate: readFloat(env, 'TCT_ERROR_RATE', { default: 0, min: 0, max: 1 }),
      outageAfterMs: readDuration(env, 'TCT_OUTAGE_AFTER', { default: 0, min: 0 }),
      outageForMs: readDuration(env, 'TCT_OUTAGE_FOR', { default: 0, min: 0 }),
      outageRepeat: readBool(env, 'TCT_OUTAGE_REPEAT', { default: false }),
    },
  };
}
