import OpenAI from "openai";
import Anthropic from "@anthropic-ai/sdk";
import { GoogleGenerativeAI } from "@google/generative-ai";
import {
  AnalysisError,
  describeError,
  getApiKey,
  loadConfig,
  providerOf,
  type ChangedocConfigV1,
  type PromptUnit,
} from "@changedoc/common";
import type { AnalysisCall, UnitAnalyst } from "./AnalysisOrchestrator";
import { renderPrompt } from "./pairingAssembler";

const SYSTEM_PROMPT = `You are a code analyst and technical writer. You compare original and modified code and explain the change for a design document.

Focus on:
- What changed and why it serves the user story
- How the new code works, referencing functions and variables by name
- Effects on the rest of the system

Answer in Markdown, using only the headings you are asked for.`;

const MAX_OUTPUT_TOKENS = 3000;

// ---------------------------------------------------------------------------
// Provider-specific implementations
// ---------------------------------------------------------------------------

async function analyseWithOpenAI(model: string, apiKey: string, prompt: string, signal: AbortSignal): Promise<string> {
  const client = new OpenAI({ apiKey });

  const response = await client.chat.completions.create(
    {
      model: model.replace("openai/", ""), // e.g. "gpt-4o-mini"
      messages: [
        { role: "system", content: SYSTEM_PROMPT },
        { role: "user", content: prompt },
      ],
      max_tokens: MAX_OUTPUT_TOKENS,
      temperature: 0,
    },
    { signal },
  );

  return response.choices[0]?.message?.content ?? "";
}

async function analyseWithAnthropic(model: string, apiKey: string, prompt: string, signal: AbortSignal): Promise<string> {
  const client = new Anthropic({ apiKey });

  const response = await client.messages.create(
    {
      model: model.replace("anthropic/", ""),
      max_tokens: MAX_OUTPUT_TOKENS,
      temperature: 0,
      system: SYSTEM_PROMPT,
      messages: [{ role: "user", content: prompt }],
    },
    { signal },
  );

  return response.content
    .map((block) => (block.type === "text" ? block.text : ""))
    .join("");
}

async function analyseWithGemini(model: string, apiKey: string, prompt: string, signal: AbortSignal): Promise<string> {
  const client = new GoogleGenerativeAI(apiKey);

  const geminiModel = client.getGenerativeModel({
    model: model.replace("google/", ""), // e.g. "gemini-1.5-pro"
    systemInstruction: SYSTEM_PROMPT,
    generationConfig: {
      temperature: 0,
      maxOutputTokens: MAX_OUTPUT_TOKENS,
    },
  });

  const result = await geminiModel.generateContent(prompt, { signal });
  return result.response.text();
}

// ---------------------------------------------------------------------------
// UnitAnalyst over the configured provider
// ---------------------------------------------------------------------------

/**
 * Build an analyst for a "provider/model" id. Retries and timeouts belong to
 * the orchestrator; every failure here surfaces as {@link AnalysisError}.
 */
export function createLlmAnalyst(model: string, apiKey: string): UnitAnalyst {
  const provider = providerOf(model);

  return {
    async analyzeUnit(unit: PromptUnit, call: AnalysisCall): Promise<string> {
      const prompt = renderPrompt(unit, call.total);

      let text = "";
      try {
        switch (provider) {
          case "openai":
            text = await analyseWithOpenAI(model, apiKey, prompt, call.signal);
            break;
          case "anthropic":
            text = await analyseWithAnthropic(model, apiKey, prompt, call.signal);
            break;
          case "google":
            text = await analyseWithGemini(model, apiKey, prompt, call.signal);
            break;
        }
      } catch (error) {
        throw new AnalysisError(`${provider} request failed: ${describeError(error)}`);
      }

      if (!text.trim()) {
        throw new AnalysisError(`${provider} returned an empty analysis`);
      }
      return text;
    },
  };
}

/**
 * Analyst for the model and key in the user's config file.
 */
export function createConfiguredAnalyst(config: ChangedocConfigV1 = loadConfig()): UnitAnalyst {
  const model = config.llm.analyst;
  const provider = providerOf(model);
  const apiKey = getApiKey(provider === "google" ? "gemini" : provider, config);
  return createLlmAnalyst(model, apiKey);
}
