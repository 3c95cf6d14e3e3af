/**
 * @changedoc/common
 * Shared utilities and types for the changedoc monorepo.
 */

import { SubmissionCancelledError } from "./errors";

/**
 * Simple sleep helper (await sleep(ms)). Rejects with
 * {@link SubmissionCancelledError} as soon as `signal` aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((res, rej) => {
    if (signal?.aborted) {
      rej(new SubmissionCancelledError());
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      rej(new SubmissionCancelledError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      res();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

// Re-export config utilities
export * from "./config";
export * from "./errors";
export type * from "./types/Chunk";
export type * from "./types/PromptUnit";
export type * from "./types/NarrativeDocument";
