import {
  InputError,
  validatePipelineSettings,
  type AnalysisResult,
  type NarrativeDocument,
  type PipelineSettings,
  type PromptUnit,
  type Submission,
} from "@changedoc/common";
import { chunkText, createSourceDocument } from "./chunker";
import { extractContext } from "./contextExtractor";
import { assemblePromptUnit } from "./pairingAssembler";
import { analyzeUnits, type UnitAnalyst } from "./AnalysisOrchestrator";

// ---------------------------------------------------------------------------
// Planning: chunk -> extract -> assemble
// ---------------------------------------------------------------------------

export interface SubmissionPlan {
  units: PromptUnit[];
  hasOriginal: boolean;
  modifiedChars: number;
  originalChars: number;
}

/**
 * Validate the submission and build its prompt units without calling the
 * analyst. Settings are checked before the input, and both before any
 * chunking starts.
 *
 * @throws {ConfigurationError} for invalid settings or a unit budget that cannot hold a chunk
 * @throws {InputError} when there is no modified code
 */
export function planSubmission(submission: Submission, settings: PipelineSettings): SubmissionPlan {
  validatePipelineSettings(settings);

  if (!submission.modifiedCode || submission.modifiedCode.trim().length === 0) {
    throw new InputError("Modified code is empty; there is nothing to analyse.");
  }

  const modified = createSourceDocument(submission.modifiedCode, submission.modifiedName);
  const original =
    submission.originalCode && submission.originalCode.trim().length > 0
      ? createSourceDocument(submission.originalCode, submission.originalName)
      : undefined;

  const chunks = chunkText(modified.text, settings.maxChunkSize, settings.overlap);

  const units = chunks.map((chunk) => {
    const window = extractContext(original, chunk, settings.maxContextSize);
    return assemblePromptUnit(
      chunk,
      window,
      submission.story,
      submission.instructions,
      settings.promptUnitBudget,
      original !== undefined,
    );
  });

  return {
    units,
    hasOriginal: original !== undefined,
    modifiedChars: modified.charCount,
    originalChars: original?.charCount ?? 0,
  };
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

export interface GenerateOptions {
  signal?: AbortSignal;
  onProgress?: (result: AnalysisResult, completed: number, total: number) => void;
}

export interface GenerationResult {
  document: NarrativeDocument;
  units: PromptUnit[];
}

/**
 * Run a whole submission: plan, analyse every unit, merge in order.
 */
export async function generateDocument(
  submission: Submission,
  settings: PipelineSettings,
  analyst: UnitAnalyst,
  opts: GenerateOptions = {},
): Promise<GenerationResult> {
  const { units } = planSubmission(submission, settings);

  const document = await analyzeUnits(units, analyst, {
    concurrency: settings.concurrency,
    retryLimit: settings.retryLimit,
    timeoutMs: settings.timeoutMs,
    backoffMs: settings.backoffMs,
    signal: opts.signal,
    onProgress: opts.onProgress,
  });

  return { document, units };
}
