import type { Chunk, ContextSpan } from "./Chunk";

export interface UserStory {
  name: string;
  description: string;
}

export interface PromptUnit {
  /** Same as the chunk index. */
  readonly index: number;
  readonly chunk: Chunk;
  readonly context: ContextSpan[];
  readonly story: UserStory;
  readonly instructions: string;
  /** Character length of every text component together. */
  readonly size: number;
  /** Context spans removed to fit the unit budget. */
  readonly droppedSpans: number;
  readonly contextTruncated: boolean;
  /** False when no original file was supplied. */
  readonly hasOriginal: boolean;
}

export interface Submission {
  story: UserStory;
  instructions: string;
  modifiedCode: string;
  /** Omitted or blank when the user supplied no original file. */
  originalCode?: string;
  originalName?: string;
  modifiedName?: string;
}
