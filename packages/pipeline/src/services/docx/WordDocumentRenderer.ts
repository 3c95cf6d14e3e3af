import {
  AlignmentType,
  Document,
  HeadingLevel,
  LevelFormat,
  Packer,
  Paragraph,
  TextRun,
} from "docx";
import type { RenderableSection, UserStory } from "@changedoc/common";
import { parseMarkdownBlocks, type MarkdownBlock } from "./markdownBlocks";

const NUMBERING_REF = "analysis-numbering";

// docx sizes are half-points
const BODY_FONT = { font: "Calibri", size: 24 };

const HEADINGS = {
  1: HeadingLevel.HEADING_1,
  2: HeadingLevel.HEADING_2,
  3: HeadingLevel.HEADING_3,
} as const;

function blockToParagraph(block: MarkdownBlock): Paragraph {
  if (block.kind === "heading") {
    return new Paragraph({ text: block.text, heading: HEADINGS[block.level] });
  }

  const children = block.runs.map((run) => new TextRun({ text: run.text, bold: run.bold }));
  switch (block.kind) {
    case "bullet":
      return new Paragraph({ children, bullet: { level: 0 } });
    case "numbered":
      return new Paragraph({ children, numbering: { reference: NUMBERING_REF, level: 0 } });
    case "paragraph":
      return new Paragraph({ children });
  }
}

function labelled(heading: string, body: string): Paragraph[] {
  return [
    new Paragraph({ text: heading, heading: HeadingLevel.HEADING_2 }),
    new Paragraph({ text: body }),
  ];
}

/**
 * Story header followed by every narrative section, each section body read
 * as Markdown.
 */
export function buildParagraphs(
  story: UserStory,
  instructions: string,
  sections: readonly RenderableSection[],
): Paragraph[] {
  const paragraphs: Paragraph[] = labelled("User Story Name", story.name);

  if (story.description.trim()) {
    paragraphs.push(...labelled("User Story Description", story.description));
  }
  if (instructions.trim()) {
    paragraphs.push(...labelled("Additional Context & Instructions", instructions));
  }

  for (const section of sections) {
    paragraphs.push(new Paragraph({ text: section.heading, heading: HeadingLevel.HEADING_1 }));
    paragraphs.push(...parseMarkdownBlocks(section.body).map(blockToParagraph));
  }

  return paragraphs;
}

export async function renderWordDocument(
  story: UserStory,
  instructions: string,
  sections: readonly RenderableSection[],
): Promise<Buffer> {
  const doc = new Document({
    creator: "changedoc",
    title: story.name || "Code Analysis",
    styles: {
      default: { document: { run: BODY_FONT } },
    },
    numbering: {
      config: [
        {
          reference: NUMBERING_REF,
          levels: [{ level: 0, format: LevelFormat.DECIMAL, text: "%1.", alignment: AlignmentType.START }],
        },
      ],
    },
    sections: [{ children: buildParagraphs(story, instructions, sections) }],
  });

  return Packer.toBuffer(doc);
}

/** "Checkout flow" -> "Checkout_flow.docx"; path separators become "_" too. */
export function outputFileName(storyName: string): string {
  const base = storyName.trim() ? storyName.trim().replace(/[ \/\\]/g, "_") : "code_analysis";
  return `${base}.docx`;
}
