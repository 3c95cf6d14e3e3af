import {
  AnalysisError,
  AnalysisTimeoutError,
  InputError,
  SubmissionCancelledError,
  SubmissionFailureError,
  describeError,
  sleep,
  type AnalysisResult,
  type NarrativeDocument,
  type NarrativeSection,
  type PromptUnit,
  type RenderableSection,
} from "@changedoc/common";

// ---------------------------------------------------------------------------
// Collaborator contract
// ---------------------------------------------------------------------------

export interface AnalysisCall {
  /** Number of units in the submission. */
  total: number;
  attempt: number;
  /** Aborted on timeout or submission cancellation. */
  signal: AbortSignal;
}

/**
 * The only thing the orchestrator knows about the model: one unit in,
 * narrative text out. Reject with {@link AnalysisError} on failure.
 */
export interface UnitAnalyst {
  analyzeUnit(unit: PromptUnit, call: AnalysisCall): Promise<string>;
}

export interface OrchestratorOptions {
  concurrency: number;
  retryLimit: number;
  timeoutMs: number;
  backoffMs: number;
  signal?: AbortSignal;
  onProgress?: (result: AnalysisResult, completed: number, total: number) => void;
}

export const FAILED_SECTION_PREFIX = "This section could not be analysed:";

// ---------------------------------------------------------------------------
// Single call with timeout and cancellation
// ---------------------------------------------------------------------------

function callWithTimeout(
  analyst: UnitAnalyst,
  unit: PromptUnit,
  total: number,
  attempt: number,
  timeoutMs: number,
  parent?: AbortSignal,
): Promise<string> {
  const controller = new AbortController();

  return new Promise<string>((resolve, reject) => {
    let timer: NodeJS.Timeout | undefined;

    const onCancel = () => settle(() => reject(new SubmissionCancelledError()), true);

    function settle(finish: () => void, abortCall: boolean): void {
      if (timer) clearTimeout(timer);
      parent?.removeEventListener("abort", onCancel);
      if (abortCall) controller.abort();
      finish();
    }

    if (parent?.aborted) {
      reject(new SubmissionCancelledError());
      return;
    }
    parent?.addEventListener("abort", onCancel, { once: true });
    timer = setTimeout(() => settle(() => reject(new AnalysisTimeoutError(timeoutMs)), true), timeoutMs);

    // A synchronous throw from the analyst must settle like a rejection.
    Promise.resolve()
      .then(() => analyst.analyzeUnit(unit, { total, attempt, signal: controller.signal }))
      .then(
        (text) => settle(() => resolve(text), false),
        (error: unknown) => settle(() => reject(error), false),
      );
  });
}

async function analyzeWithRetry(
  analyst: UnitAnalyst,
  unit: PromptUnit,
  total: number,
  options: OrchestratorOptions,
): Promise<AnalysisResult> {
  const maxAttempts = options.retryLimit + 1;
  let lastError = "unknown error";

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    if (options.signal?.aborted) throw new SubmissionCancelledError();
    try {
      const text = await callWithTimeout(analyst, unit, total, attempt, options.timeoutMs, options.signal);
      if (!text.trim()) {
        throw new AnalysisError("Analyst returned an empty response");
      }
      return { index: unit.index, text: text.trim(), status: "analysed", attempts: attempt };
    } catch (error) {
      if (error instanceof SubmissionCancelledError) throw error;
      lastError = describeError(error);
      console.warn(`Analysis attempt ${attempt}/${maxAttempts} for section ${unit.index + 1} failed: ${lastError}`);

      if (attempt < maxAttempts) {
        // Exponential backoff, cut short by cancellation
        await sleep(options.backoffMs * Math.pow(2, attempt - 1), options.signal);
      }
    }
  }

  return {
    index: unit.index,
    text: `${FAILED_SECTION_PREFIX} ${lastError}`,
    status: "failed",
    attempts: maxAttempts,
    error: lastError,
  };
}

// ---------------------------------------------------------------------------
// Merge
// ---------------------------------------------------------------------------

export function collectNotes(units: readonly PromptUnit[]): string[] {
  const notes: string[] = [];
  if (units.some((u) => !u.hasOriginal)) {
    notes.push("No original file was supplied; the analysis is based on the modified code only.");
  }
  for (const unit of units) {
    if (unit.contextTruncated) {
      notes.push(`Context from the original file was truncated for section ${unit.index + 1}.`);
    }
    if (unit.droppedSpans > 0) {
      notes.push(
        `${unit.droppedSpans} context span(s) from the original file were left out of section ${unit.index + 1} to fit the prompt budget.`,
      );
    }
  }
  return notes;
}

export function mergeResults(units: readonly PromptUnit[], results: readonly AnalysisResult[]): NarrativeDocument {
  const total = results.length;
  const ordered = [...results].sort((a, b) => a.index - b.index);
  const failedCount = ordered.filter((r) => r.status === "failed").length;

  const sections: NarrativeSection[] = ordered.map((result, position) => ({
    index: result.index,
    heading: total === 1 ? "Code Analysis" : `Section ${position + 1} of ${total}`,
    body: result.text,
    status: result.status,
  }));

  let overview: string | undefined;
  if (total > 1) {
    overview =
      `The modified code was split into ${total} sections for analysis. ` +
      "Each section below covers one contiguous part of the change, in order.";
    if (failedCount > 0) {
      overview += ` ${failedCount} of them could not be analysed.`;
    }
  }

  return { overview, notes: collectNotes(units), sections, chunkCount: total, failedCount };
}

/**
 * Ordered (heading, body) pairs for the rendering collaborator.
 */
export function toRenderableSections(document: NarrativeDocument): RenderableSection[] {
  const out: RenderableSection[] = [];
  if (document.overview) out.push({ heading: "Overview", body: document.overview });
  if (document.notes.length > 0) {
    out.push({ heading: "Notes", body: document.notes.map((n) => `- ${n}`).join("\n") });
  }
  for (const section of document.sections) {
    out.push({ heading: section.heading, body: section.body });
  }
  return out;
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Analyse every unit with at most `concurrency` calls in flight and merge the
 * results in unit order.
 *
 * @throws {SubmissionFailureError} when every unit failed
 * @throws {SubmissionCancelledError} when `signal` aborts
 */
export async function analyzeUnits(
  units: readonly PromptUnit[],
  analyst: UnitAnalyst,
  options: OrchestratorOptions,
): Promise<NarrativeDocument> {
  if (units.length === 0) {
    throw new InputError("Nothing to analyse: no prompt units were produced");
  }
  if (options.signal?.aborted) throw new SubmissionCancelledError();

  const total = units.length;
  const results: AnalysisResult[] = new Array<AnalysisResult>(total);
  let cursor = 0;
  let completed = 0;

  const worker = async (): Promise<void> => {
    while (cursor < total) {
      const position = cursor++;
      const result = await analyzeWithRetry(analyst, units[position], total, options);
      results[position] = result;
      completed++;
      options.onProgress?.(result, completed, total);
    }
  };

  const width = Math.max(1, Math.min(options.concurrency, total));
  await Promise.all(Array.from({ length: width }, () => worker()));

  if (options.signal?.aborted) throw new SubmissionCancelledError();

  const failures = results.filter((r) => r.status === "failed");
  if (failures.length === total) {
    throw new SubmissionFailureError(failures.map((r) => ({ index: r.index, reason: r.error ?? "unknown error" })));
  }

  return mergeResults(units, results);
}
