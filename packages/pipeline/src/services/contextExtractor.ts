import type { Chunk, ContextSpan, ContextWindow, SourceDocument } from "@changedoc/common";
import { chunkContent, chunkText } from "./chunker";

/**
 * Lexical relevance between a modified chunk and slices of the original file.
 *
 * Scores are deterministic: shared identifiers weighted by how rare they are
 * across the original, plus a flat bonus for whole lines present in both.
 * Weights are tunable and carry no compatibility promise.
 */

export const LINE_MATCH_WEIGHT = 2;
export const MIN_LINE_LENGTH = 4;

const TOKEN = /[A-Za-z_$][A-Za-z0-9_$]*|\d{2,}/g;

export interface ExtractOptions {
  /** Candidate span size; defaults to the chunk's own size, capped at the budget. */
  spanSize?: number;
}

interface Candidate {
  start: number;
  end: number;
  text: string;
  tokens: Set<string>;
  lines: Set<string>;
}

export function tokenize(text: string): Set<string> {
  return new Set(text.match(TOKEN) ?? []);
}

export function significantLines(text: string): Set<string> {
  const lines = new Set<string>();
  for (const raw of text.split("\n")) {
    const line = raw.trim();
    if (line.length >= MIN_LINE_LENGTH) lines.add(line);
  }
  return lines;
}

function emptyWindow(sourceId?: string): ContextWindow {
  return { spans: [], truncated: false, sourceId };
}

/**
 * Score every candidate against the modified text. Returned scores line up
 * with `candidates` by position.
 */
function scoreCandidates(candidates: Candidate[], modified: string): number[] {
  const queryTokens = tokenize(modified);
  const queryLines = significantLines(modified);

  const docFrequency = new Map<string, number>();
  for (const candidate of candidates) {
    for (const token of candidate.tokens) {
      docFrequency.set(token, (docFrequency.get(token) ?? 0) + 1);
    }
  }

  const n = candidates.length;
  return candidates.map((candidate) => {
    let score = 0;
    for (const token of queryTokens) {
      if (!candidate.tokens.has(token)) continue;
      const df = docFrequency.get(token) ?? 1;
      score += Math.log(1 + n / df);
    }
    for (const line of queryLines) {
      if (candidate.lines.has(line)) score += LINE_MATCH_WEIGHT;
    }
    return score;
  });
}

/**
 * Select the parts of the original file most relevant to one modified chunk,
 * keeping their combined length within `maxContextSize`.
 */
export function extractContext(
  original: SourceDocument | undefined,
  modifiedChunk: Chunk,
  maxContextSize: number,
  options: ExtractOptions = {},
): ContextWindow {
  if (!original || original.text.trim().length === 0) {
    return emptyWindow(original?.id);
  }

  const modified = chunkContent(modifiedChunk);
  const spanSize = options.spanSize ?? Math.max(1, Math.min(modified.length, maxContextSize));

  const candidates: Candidate[] = chunkText(original.text, spanSize, 0).map((c) => ({
    start: c.start,
    end: c.end,
    text: c.text,
    tokens: tokenize(c.text),
    lines: significantLines(c.text),
  }));
  const scores = scoreCandidates(candidates, modified);

  // Rank by score, earlier span first on ties.
  const ranked = candidates
    .map((candidate, position) => ({ candidate, position, score: scores[position] }))
    .filter((entry) => entry.score > 0)
    .sort((a, b) => b.score - a.score || a.position - b.position);

  if (ranked.length === 0) {
    return emptyWindow(original.id);
  }

  const best = ranked[0];
  if (best.candidate.text.length > maxContextSize) {
    const text = best.candidate.text.slice(0, maxContextSize);
    return {
      spans: [{ start: best.candidate.start, end: best.candidate.start + text.length, text, score: best.score }],
      truncated: true,
      sourceId: original.id,
    };
  }

  const selected: Array<{ position: number; span: ContextSpan }> = [];
  let used = 0;
  for (const entry of ranked) {
    const length = entry.candidate.text.length;
    if (used + length > maxContextSize) break;
    used += length;
    selected.push({
      position: entry.position,
      span: { start: entry.candidate.start, end: entry.candidate.end, text: entry.candidate.text, score: entry.score },
    });
  }

  return {
    spans: selected.sort((a, b) => a.position - b.position).map((entry) => entry.span),
    truncated: false,
    sourceId: original.id,
  };
}
