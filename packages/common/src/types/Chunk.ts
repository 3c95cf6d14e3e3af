/**
 * Types for source text and the slices the chunker and context extractor
 * produce from it.
 */

export interface SourceDocument {
  /** File name, or "unnamed" for pasted text. */
  readonly id: string;
  readonly text: string;
  readonly lineCount: number;
  readonly charCount: number;
}

export interface Chunk {
  /** 0-based position in the parent document. */
  readonly index: number;
  /** Offset of the first body character in the parent document. */
  readonly start: number;
  /** Exclusive end offset. */
  readonly end: number;
  /** Body text, `source.slice(start, end)`. */
  readonly text: string;
  /** Trailing text of the preceding chunk(s), shown ahead of the body. */
  readonly overlap: string;
}

export interface ContextSpan {
  readonly start: number;
  readonly end: number;
  readonly text: string;
  /** Relevance against the modified chunk; used for selection only. */
  readonly score: number;
}

export interface ContextWindow {
  /** Selected spans in original document order. */
  readonly spans: ContextSpan[];
  /** Set when the best span alone exceeded the budget and was cut. */
  readonly truncated: boolean;
  readonly sourceId?: string;
}
