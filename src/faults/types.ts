export type Outcome =
  | 'success'
  | 'server_error'
  | 'timeout'
  | 'connection_error'
  | 'other_error'
  | 'hang'
  | 'outage';

export type SenderOutcome = Extract<Outcome, 'success' | 'server_error' | 'timeout' | 'connection_error' | 'other_error'>;

export type ReceiverOutcome = Extract<Outcome, 'success' | 'server_error' | 'hang' | 'outage'>;

export interface FaultConfig {
  responseDelayMs: number;
  /** Upper bound of the uniform random delay added on top of responseDelayMs. */
  responseJitterMs: number;
  hangRate: number;
  errorRate: number;
  outageAfterMs: number;
  outageForMs: number;
  outageRepeat: boolean;
}

/** Returns a uniform value in [0, 1). */
export type RandomSource = () => number;

export type Clock = () => number;
