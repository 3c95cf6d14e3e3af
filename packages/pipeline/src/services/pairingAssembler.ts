import {
  ConfigurationError,
  type Chunk,
  type ContextSpan,
  type ContextWindow,
  type PromptUnit,
  type UserStory,
} from "@changedoc/common";
import { chunkContent } from "./chunker";

/**
 * Character length of every component that goes into a prompt unit, in
 * concatenation order: story name, story description, instructions, context
 * spans, chunk.
 */
export function measureUnit(
  story: UserStory,
  instructions: string,
  spans: readonly ContextSpan[],
  chunk: Chunk,
): number {
  let size = story.name.length + story.description.length + instructions.length;
  for (const span of spans) size += span.text.length;
  return size + chunkContent(chunk).length;
}

/**
 * Pair one modified chunk with its context, the user story and the extra
 * instructions. Context is trimmed (lowest score first) to fit `budget`;
 * the chunk and story never are.
 *
 * @throws {ConfigurationError} when the chunk and story alone exceed the budget
 */
export function assemblePromptUnit(
  chunk: Chunk,
  window: ContextWindow,
  story: UserStory,
  instructions: string,
  budget: number,
  hasOriginal = true,
): PromptUnit {
  const spans = window.spans.map((span, position) => ({ span, position }));
  let size = measureUnit(story, instructions, window.spans, chunk);

  if (size > budget) {
    // Drop order: lowest score, then latest in the document.
    const dropOrder = [...spans].sort((a, b) => a.span.score - b.span.score || b.position - a.position);
    const dropped = new Set<number>();
    for (const entry of dropOrder) {
      if (size <= budget) break;
      dropped.add(entry.position);
      size -= entry.span.text.length;
    }
    if (size > budget) {
      throw new ConfigurationError(
        `Prompt unit ${chunk.index + 1} needs ${size} characters without any context but the unit budget is ${budget}`,
        "Lower maxChunkSize/overlap or raise promptUnitBudget",
      );
    }
    const kept = spans.filter((entry) => !dropped.has(entry.position)).map((entry) => entry.span);
    return Object.freeze({
      index: chunk.index,
      chunk,
      context: kept,
      story,
      instructions,
      size,
      droppedSpans: dropped.size,
      contextTruncated: window.truncated,
      hasOriginal,
    });
  }

  return Object.freeze({
    index: chunk.index,
    chunk,
    context: [...window.spans],
    story,
    instructions,
    size,
    droppedSpans: 0,
    contextTruncated: window.truncated,
    hasOriginal,
  });
}

export const RESPONSE_FORMAT = `Provide technical explanation in this exact format:

## Solution
[Overall what changed]

### How It Works
[Technical details with code references]

### Impacts
[Potential effects on system]`;

/**
 * Render the text sent to the model for one unit.
 */
export function renderPrompt(unit: PromptUnit, total: number): string {
  const parts: string[] = [
    `User Story Name:\n${unit.story.name || "(not provided)"}`,
    `User Story Description:\n${unit.story.description || "(not provided)"}`,
  ];

  if (unit.instructions.trim()) {
    parts.push(`Additional Context & Instructions:\n${unit.instructions}`);
  }

  if (unit.context.length > 0) {
    const sections = unit.context.map((span) => `[original offsets ${span.start}-${span.end}]\n${span.text}`);
    parts.push(`Original Code (Key Sections):\n${sections.join("\n\n")}`);
  } else {
    parts.push("Original Code (Key Sections):\nNo original code provided");
  }

  if (total > 1) {
    parts.push(
      `This is part ${unit.index + 1} of ${total} of the modified code.` +
        (unit.chunk.overlap ? " It begins with a few lines repeated from the previous part for continuity." : ""),
    );
  }

  parts.push(`Modified Code:\n${chunkContent(unit.chunk)}`);
  parts.push(RESPONSE_FORMAT);

  return parts.join("\n\n");
}
