/**
 * Minimal Markdown reader for model output: headings, bullet and numbered
 * items, paragraphs and **bold** runs. Anything else is kept as plain text.
 */

export interface TextSpan {
  text: string;
  bold: boolean;
}

export type MarkdownBlock =
  | { kind: "heading"; level: 1 | 2 | 3; text: string }
  | { kind: "bullet"; runs: TextSpan[] }
  | { kind: "numbered"; runs: TextSpan[] }
  | { kind: "paragraph"; runs: TextSpan[] };

const HEADING = /^(#+)\s*(.+)$/;
const NUMBERED = /^\d+\.\s+/;

export function splitBoldRuns(text: string): TextSpan[] {
  return text
    .split(/(\*\*.+?\*\*)/)
    .filter((segment) => segment.length > 0)
    .map((segment) =>
      segment.length > 4 && segment.startsWith("**") && segment.endsWith("**")
        ? { text: segment.slice(2, -2), bold: true }
        : { text: segment, bold: false },
    );
}

/**
 * Headings are capped at level 2, except a "How It Works" heading that
 * follows a "Solution" heading, which nests at level 3.
 */
export function parseMarkdownBlocks(markdown: string): MarkdownBlock[] {
  const blocks: MarkdownBlock[] = [];
  let underSolution = false;

  for (const raw of markdown.split(/\r?\n/)) {
    const line = raw.trim();
    if (!line) continue;

    const heading = HEADING.exec(line);
    if (heading) {
      const text = heading[2].replace(/#+\s*$/, "").trim();
      let level: 1 | 2 | 3 = heading[1].length === 1 ? 1 : 2;
      if (text.includes("Solution")) {
        underSolution = true;
      } else if (text.includes("How It Works") && underSolution) {
        level = 3;
      }
      blocks.push({ kind: "heading", level, text });
      continue;
    }

    if (line.startsWith("- ") || line.startsWith("* ")) {
      blocks.push({ kind: "bullet", runs: splitBoldRuns(line.slice(2)) });
    } else if (NUMBERED.test(line)) {
      blocks.push({ kind: "numbered", runs: splitBoldRuns(line.replace(NUMBERED, "")) });
    } else {
      blocks.push({ kind: "paragraph", runs: splitBoldRuns(line) });
    }
  }

  return blocks;
}
