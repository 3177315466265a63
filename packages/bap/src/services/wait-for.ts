import { setTimeout as sleep } from "node:timers/promises";
import { CallbackTimeout } from "@fis-bap/shared";

export interface WaitOptions {
  /** Named in the CallbackTimeout, e.g. "on_select". */
  stage: string;
  intervalMs: number;
  timeoutMs: number;
  /** Aborting stops the wait at once with the signal's reason. */
  signal?: AbortSignal;
}

/**
 * Poll `probe` until it yields a value or the deadline passes.
 *
 * The probe runs immediately, then every `intervalMs`; the last sleep is
 * shortened so the wait never overruns `timeoutMs`.
 */
export async function waitForRecord<T>(
  probe: () => Promise<T | null>,
  options: WaitOptions,
): Promise<T> {
  const { stage, intervalMs, timeoutMs, signal } = options;
  const startedAt = Date.now();
  const deadline = startedAt + timeoutMs;

  for (;;) {
    signal?.throwIfAborted();
    const found = await probe();
    if (found !== null) return found;

    const remaining = deadline - Date.now();
    if (remaining <= 0) {
      throw new CallbackTimeout(stage, Date.now() - startedAt);
    }
    await sleep(Math.min(intervalMs, remaining), undefined, { signal }).catch((err: unknown) => {
      // Surface the caller's abort reason rather than the timer's AbortError.
      signal?.throwIfAborted();
      throw err;
    });
  }
}
