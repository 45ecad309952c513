/**
 * Returns a signal that aborts as soon as any of the given signals does.
 * Listeners are removed by calling the returned `release`.
 */
export function linkAbortSignals(
  ...signals: (AbortSignal | undefined)[]
): { signal: AbortSignal; release: () => void } {
  const controller = new AbortController();
  const cleanups: (() => void)[] = [];

  for (const source of signals) {
    if (!source) continue;
    if (source.aborted) {
      controller.abort(source.reason);
      break;
    }
    const onAbort = (): void => controller.abort(source.reason);
    source.addEventListener("abort", onAbort, { once: true });
    cleanups.push(() => source.removeEventListener("abort", onAbort));
  }

  return {
    signal: controller.signal,
    release: () => cleanups.forEach((cleanup) => cleanup()),
  };
}
