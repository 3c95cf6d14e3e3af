import { ConfigurationError, type Chunk, type SourceDocument } from "@changedoc/common";

/**
 * Boundary-based chunker for arbitrary source text. No grammar is involved:
 * cuts land after a blank line or a line break, so a single statement line
 * is never split unless it alone is longer than the limit.
 */

/** A blank-line cut must keep at least this share of the window. */
export const BLANK_LINE_MIN_FILL = 0.5;

// "\r" keeps CRLF blank lines recognisable.
const BLANK_LINE = /\n[ \t\r]*\n/g;

export function createSourceDocument(text: string, id = "unnamed"): SourceDocument {
  return Object.freeze({
    id: id || "unnamed",
    text,
    lineCount: text.length === 0 ? 0 : text.split("\n").length,
    charCount: text.length,
  });
}

function assertChunkParams(maxChunkSize: number, overlap: number): void {
  if (!Number.isInteger(maxChunkSize) || maxChunkSize <= 0) {
    throw new ConfigurationError(`maxChunkSize must be a positive integer (got ${maxChunkSize})`);
  }
  if (!Number.isInteger(overlap) || overlap < 0 || overlap >= maxChunkSize) {
    throw new ConfigurationError(
      `overlap must be an integer in [0, ${maxChunkSize}) (got ${overlap})`,
    );
  }
}

/**
 * Find the exclusive end offset of the chunk starting at `pos`.
 * Preference: blank line in the back half of the window, then the last line
 * break, then a hard cut at the limit.
 */
export function findCut(text: string, pos: number, maxChunkSize: number): number {
  const limit = pos + maxChunkSize;
  if (limit >= text.length) return text.length;

  const window = text.slice(pos, limit);

  let blankCut = -1;
  BLANK_LINE.lastIndex = 0;
  for (let m = BLANK_LINE.exec(window); m !== null; m = BLANK_LINE.exec(window)) {
    blankCut = m.index + m[0].length;
    // Step back one so "\n\n\n" yields every blank line, not every other one.
    BLANK_LINE.lastIndex = m.index + m[0].length - 1;
  }
  if (blankCut >= maxChunkSize * BLANK_LINE_MIN_FILL) {
    return pos + blankCut;
  }

  const lineBreak = window.lastIndexOf("\n");
  if (lineBreak >= 0) {
    return pos + lineBreak + 1;
  }

  return limit;
}

/**
 * Split `text` into ordered chunks whose bodies are at most `maxChunkSize`
 * characters. Each chunk after the first also carries the `overlap`
 * characters that precede it.
 */
export function chunkText(text: string, maxChunkSize: number, overlap: number): Chunk[] {
  assertChunkParams(maxChunkSize, overlap);
  if (text.length === 0) return [];

  const chunks: Chunk[] = [];
  let pos = 0;
  while (pos < text.length) {
    const end = findCut(text, pos, maxChunkSize);
    chunks.push(
      Object.freeze({
        index: chunks.length,
        start: pos,
        end,
        text: text.slice(pos, end),
        overlap: overlap > 0 ? text.slice(Math.max(0, pos - overlap), pos) : "",
      }),
    );
    pos = end;
  }
  return chunks;
}

/** What the analyst sees for a chunk: overlap then body. */
export function chunkContent(chunk: Chunk): string {
  return chunk.overlap + chunk.text;
}

/** Join chunk bodies back together; inverse of {@link chunkText}. */
export function reconstructText(chunks: readonly Chunk[]): string {
  return [...chunks]
    .sort((a, b) => a.index - b.index)
    .map((c) => c.text)
    .join("");
}
