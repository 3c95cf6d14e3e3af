import type { Arguments, CommandBuilder, CommandModule } from "yargs";
import path from "node:path";
import fs from "node:fs";
import prompts from "prompts";
import {
  CONFIG_PATH,
  DEFAULT_ANALYST_MODEL,
  DEFAULT_PIPELINE_SETTINGS,
  encryptSecret,
  type ChangedocConfigV1,
  type LlmKeys,
} from "@changedoc/common";

interface InitArgs extends Arguments {
  nonInteractive?: boolean;
}

const CONFIG_DIR = path.dirname(CONFIG_PATH);

const MODEL_CHOICES = [
  "openai/gpt-4o-mini",
  "openai/gpt-4o",
  "anthropic/claude-3-5-sonnet-latest",
  "google/gemini-1.5-pro",
];

function encryptKeys(keys: LlmKeys): LlmKeys {
  const encryptedKeys: LlmKeys = {};
  for (const provider of ["anthropic", "openai", "gemini"] as const) {
    const key = keys[provider];
    if (key) encryptedKeys[provider] = encryptSecret(key);
  }
  return encryptedKeys;
}

const builder: CommandBuilder<InitArgs, InitArgs> = (yargs) =>
  yargs.option("non-interactive", {
    type: "boolean",
    desc: "Generate config from env vars without prompting",
  });

async function handler(argv: InitArgs): Promise<void> {
  if (!fs.existsSync(CONFIG_DIR)) fs.mkdirSync(CONFIG_DIR, { recursive: true });

  let analyst: string;
  let keys: LlmKeys;

  if (!argv.nonInteractive) {
    const answers = await prompts([
      {
        type: "text",
        name: "openai",
        message: "OpenAI API key (leave blank to skip):",
        initial: "",
      },
      {
        type: "text",
        name: "anthropic",
        message: "Anthropic API key (leave blank to skip):",
        initial: "",
      },
      {
        type: "text",
        name: "gemini",
        message: "Google Gemini key (leave blank to skip):",
        initial: "",
      },
      {
        type: "select",
        name: "analyst",
        message: "Select analyst model:",
        choices: MODEL_CHOICES.map((model) => ({ title: model, value: model })),
        initial: 0,
      },
    ]);
    analyst = typeof answers.analyst === "string" ? answers.analyst : DEFAULT_ANALYST_MODEL;
    keys = {
      openai: answers.openai || undefined,
      anthropic: answers.anthropic || undefined,
      gemini: answers.gemini || undefined,
    };
  } else {
    // generate from env vars
    analyst = process.env.CHANGEDOC_ANALYST_MODEL || DEFAULT_ANALYST_MODEL;
    keys = {
      openai: process.env.OPENAI_API_KEY,
      anthropic: process.env.ANTHROPIC_API_KEY,
      gemini: process.env.GEMINI_API_KEY,
    };
  }

  const config: ChangedocConfigV1 = {
    schemaVersion: 1,
    llm: { analyst, keys: encryptKeys(keys) },
    pipeline: { ...DEFAULT_PIPELINE_SETTINGS },
  };

  fs.writeFileSync(CONFIG_PATH, JSON.stringify(config, null, 2), "utf8");
  console.log(`Config saved to ${CONFIG_PATH}`);
}

export const initCommand: CommandModule<InitArgs, InitArgs> = {
  command: "init",
  describe: "Interactive wizard for initial changedoc configuration",
  builder,
  handler,
};
