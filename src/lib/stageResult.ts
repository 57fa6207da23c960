/**
 * Output of a stage that always produces a usable value. `degraded` is true
 * when some or all of the value came from fallbacks rather than computation.
 */
export type StageResult<T> = {
  value: T;
  degraded: boolean;
};

export function computed<T>(value: T): StageResult<T> {
  return { value, degraded: false };
}

export function fallback<T>(value: T): StageResult<T> {
  return { value, degraded: true };
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Runs `fn`, turning any rejection into the fallback value. The failure is
 * logged with `label` so it stays visible in job output.
 */
export async function settle<T>(
  label: string,
  fn: () => Promise<T> | T,
  fallbackValue: () => T
): Promise<StageResult<T>> {
  try {
    return computed(await fn());
  } catch (error) {
    console.warn(`⚠️  ${label} failed, using defaults: ${errorMessage(error)}`);
    return fallback(fallbackValue());
  }
}
