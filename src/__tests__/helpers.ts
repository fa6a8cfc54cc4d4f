import type { Histogram, Registry } from 'prom-client';

/**
 * Reads one series of a registered metric. `series` selects histogram
 * sub-series such as `<name>_count` or `<name>_sum`.
 */
export async function metricValue(
  register: Registry,
  name: string,
  labels: Record<string, string> = {},
  series: string = name
): Promise<number> {
  const metric = register.getSingleMetric(name);
  if (!metric) {
    throw new Error(`metric ${name} is not registered`);
  }

  const { values }: { values: Awaited<ReturnType<Histogram['get']>>['values'] } =
    await metric.get();
  const match = values.find(v =>
    (v.metricName ?? name) === series &&
    Object.entries(labels).every(([key, value]) => v.labels[key] === value)
  );

  return match?.value ?? 0;
}

/** Returns the given values in order, then throws if drawn again. */
export function sequence(...values: number[]): () => number {
  let index = 0;
  return () => {
    if (index >= values.length) {
      throw new Error(`random source exhausted after ${values.length} draws`);
    }
    return values[index++];
  };
}

export async function flushPromises(rounds: number = 20): Promise<void> {
  for (let i = 0; i < rounds; i++) {
    await Promise.resolve();
  }
}
