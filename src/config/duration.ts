const UNIT_MS: Record<string, number> = {
  ns: 1e-6,
  us: 1e-3,
  'µs': 1e-3,
  'μs': 1e-3,
  ms: 1,
  s: 1000,
  m: 60_000,
  h: 3_600_000,
};

const SEGMENT = /(\d+(?:\.\d*)?|\.\d+)(ns|us|µs|μs|ms|s|m|h)/y;

/**
 * Parses a duration string such as "300ms", "1.5s" or "1m30s" into
 * milliseconds. A bare "0" is accepted; any other value needs a unit on
 * every segment. Returns null when the string is not a valid duration.
 */
export function parseDuration(value: string): number | null {
  let input = value.trim();
  let sign = 1;

  if (input.startsWith('-') || input.startsWith('+')) {
    sign = input.startsWith('-') ? -1 : 1;
    input = input.slice(1);
  }

  if (input === '0') return 0;
  if (input === '') return null;

  let total = 0;
  SEGMENT.lastIndex = 0;

  while (SEGMENT.lastIndex < input.length) {
    const start = SEGMENT.lastIndex;
    const match = SEGMENT.exec(input);
    if (!match || match.index !== start) return null;

    total += parseFloat(match[1]) * UNIT_MS[match[2]];
  }

  return sign * total;
}

export function formatDuration(ms: number): string {
  if (ms === 0) return '0s';
  if (Math.abs(ms) < 1000) return `${ms}ms`;
  return `${ms / 1000}s`;
}
