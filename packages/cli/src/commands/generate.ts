import type { Arguments, CommandBuilder, CommandModule } from "yargs";
import { resolve, basename } from "node:path";
import { existsSync, readFileSync, writeFileSync } from "node:fs";
import chalk from "chalk";
import {
  ChangedocError,
  InputError,
  isConfigured,
  loadConfig,
  resolvePipelineSettings,
  type ChangedocConfigV1,
  type PipelineSettings,
  type RenderableSection,
  type Submission,
} from "@changedoc/common";
import {
  createConfiguredAnalyst,
  generateDocument,
  outputFileName,
  planSubmission,
  renderWordDocument,
  toRenderableSections,
  type SubmissionPlan,
} from "@changedoc/pipeline";
import { estimateSubmissionCost, promptCostConfirmation } from "../utils/costEstimator";

export interface GenerateArgs extends Arguments {
  modified?: string;
  original?: string;
  storyName?: string;
  storyDescription?: string;
  instructions?: string;
  output?: string;
  dryRun?: boolean;
  preview?: boolean;
  yes?: boolean;
  maxChunkSize?: number;
  overlap?: number;
  maxContextSize?: number;
  promptUnitBudget?: number;
  concurrency?: number;
  retryLimit?: number;
  timeout?: number;
}

const builder: CommandBuilder<GenerateArgs, GenerateArgs> = (yargs) =>
  yargs
    .option("modified", {
      alias: "m",
      type: "string",
      desc: "File with the modified code ('-' reads stdin)",
      demandOption: true,
    })
    .option("original", {
      alias: "o",
      type: "string",
      desc: "Original version of the file (optional)",
    })
    .option("story-name", { type: "string", desc: "User story name", default: "" })
    .option("story-description", { type: "string", desc: "User story description", default: "" })
    .option("instructions", {
      alias: "i",
      type: "string",
      desc: "Additional context or specific instructions for the analysis",
      default: "",
    })
    .option("output", { type: "string", desc: "Output .docx path (default: <story name>.docx)" })
    .option("dry-run", { type: "boolean", desc: "Print the prompt unit plan without calling the model", default: false })
    .option("preview", { type: "boolean", desc: "Print the analysis Markdown before writing the document", default: false })
    .option("yes", { alias: "y", type: "boolean", desc: "Skip the cost confirmation", default: false })
    .option("max-chunk-size", { type: "number", desc: "Max characters per modified-code chunk" })
    .option("overlap", { type: "number", desc: "Characters repeated between consecutive chunks" })
    .option("max-context-size", { type: "number", desc: "Max original-file characters per chunk" })
    .option("prompt-unit-budget", { type: "number", desc: "Max characters per prompt unit" })
    .option("concurrency", { type: "number", desc: "Analysis calls in flight" })
    .option("retry-limit", { type: "number", desc: "Retries per failed analysis call" })
    .option("timeout", { type: "number", desc: "Per-call timeout in milliseconds" });

function readSource(file: string, label: string): string {
  if (file === "-") return readFileSync(0, "utf8");
  const path = resolve(file);
  if (!existsSync(path)) {
    throw new InputError(`${label} file not found: ${path}`);
  }
  return readFileSync(path, "utf8");
}

function settingsFromArgs(args: GenerateArgs): Partial<PipelineSettings> {
  return {
    maxChunkSize: args.maxChunkSize,
    overlap: args.overlap,
    maxContextSize: args.maxContextSize,
    promptUnitBudget: args.promptUnitBudget,
    concurrency: args.concurrency,
    retryLimit: args.retryLimit,
    timeoutMs: args.timeout,
  };
}

function printPlan(plan: SubmissionPlan, settings: PipelineSettings): void {
  console.log(
    `   ${plan.units.length} section(s) from ${plan.modifiedChars} modified characters` +
      (plan.hasOriginal ? ` against ${plan.originalChars} original characters` : " (no original file)"),
  );
  for (const unit of plan.units) {
    console.log(
      chalk.gray(
        `   #${unit.index + 1} chars ${unit.chunk.start}-${unit.chunk.end}, ` +
          `${unit.context.length} context span(s), ${unit.size}/${settings.promptUnitBudget} budget`,
      ),
    );
  }
}

function printPreview(sections: readonly RenderableSection[]): void {
  console.log(chalk.bold("\nAnalysis preview:"));
  for (const section of sections) {
    console.log("");
    console.log(chalk.cyan(`## ${section.heading}`));
    console.log(section.body);
  }
  console.log("");
}

export async function runGenerate(args: GenerateArgs): Promise<void> {
  if (!args.modified) {
    throw new InputError("--modified is required");
  }

  const submission: Submission = {
    story: { name: args.storyName ?? "", description: args.storyDescription ?? "" },
    instructions: args.instructions ?? "",
    modifiedCode: readSource(args.modified, "Modified code"),
    modifiedName: args.modified === "-" ? "unnamed" : basename(args.modified),
    originalCode: args.original ? readSource(args.original, "Original") : undefined,
    originalName: args.original ? basename(args.original) : undefined,
  };

  // A dry run works without a config file; a real run needs the model key.
  const config: ChangedocConfigV1 | undefined = args.dryRun && !isConfigured() ? undefined : loadConfig();
  const settings = resolvePipelineSettings(config?.pipeline, settingsFromArgs(args));

  console.log("Planning prompt units...");
  const plan = planSubmission(submission, settings);
  printPlan(plan, settings);

  if (args.dryRun || !config) {
    return;
  }

  const estimate = estimateSubmissionCost(plan.units, config.llm.analyst);
  const approved = args.yes || (await promptCostConfirmation(estimate));
  if (!approved) {
    console.log("Generation cancelled by user");
    return;
  }

  const controller = new AbortController();
  const onInterrupt = () => {
    console.log(chalk.yellow("\nCancelling analysis..."));
    controller.abort();
  };
  process.once("SIGINT", onInterrupt);

  try {
    console.log(`Analysing with ${config.llm.analyst}...`);
    const { document } = await generateDocument(submission, settings, createConfiguredAnalyst(config), {
      signal: controller.signal,
      onProgress: (result, completed, total) => {
        const mark = result.status === "analysed" ? chalk.green("ok") : chalk.red("failed");
        console.log(`   [${completed}/${total}] section ${result.index + 1} ${mark}`);
      },
    });

    const sections = toRenderableSections(document);
    if (args.preview) printPreview(sections);

    const buffer = await renderWordDocument(submission.story, submission.instructions, sections);
    const outputPath = resolve(args.output ?? outputFileName(submission.story.name));
    writeFileSync(outputPath, buffer);

    if (document.failedCount > 0) {
      console.log(chalk.yellow(`${document.failedCount} section(s) could not be analysed and hold a placeholder.`));
    }
    console.log(chalk.green(`Document written to: ${outputPath}`));
  } finally {
    process.removeListener("SIGINT", onInterrupt);
  }
}

export function reportError(error: unknown): void {
  if (error instanceof ChangedocError) {
    console.error(`${chalk.red.bold("Error:")} ${error.message}`);
    if (error.internalDetails) {
      console.error(chalk.dim(`Details: ${error.internalDetails}`));
    }
    return;
  }
  console.error(chalk.red(`Generation failed: ${error instanceof Error ? error.message : String(error)}`));
}

export const generateCommand: CommandModule<GenerateArgs, GenerateArgs> = {
  command: "generate",
  describe: "Generate a Word design document for a code change",
  builder,
  handler: async (argv) => {
    try {
      await runGenerate(argv);
    } catch (error) {
      reportError(error);
      process.exit(1);
    }
  },
};
