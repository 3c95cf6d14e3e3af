/**
 * Unit tests for the changedoc init command
 */

import fs from "node:fs";
import path from "node:path";
import { Arguments } from "yargs";

// Mock prompts module
const mockPrompts = jest.fn();
jest.mock("prompts", () => mockPrompts);

// Mock fs operations
jest.mock("node:fs");
const mockedFs = fs as jest.Mocked<typeof fs>;

// Mock os operations
jest.mock("node:os", () => ({
  homedir: jest.fn(() => "/home/testuser"),
}));

// Mock console.log
const mockConsoleLog = jest.spyOn(console, "log").mockImplementation();

// Import after mocks are set up
import { initCommand } from "../../src/commands/init";
import { decryptSecret } from "@changedoc/common";

function writtenConfig(): { schemaVersion: number; llm: { analyst: string; keys: Record<string, string> }; pipeline: Record<string, number> } {
  const [, json] = mockedFs.writeFileSync.mock.calls[0];
  return JSON.parse(String(json));
}

describe("changedoc init command", () => {
  const mockConfigDir = path.join("/home/testuser", ".changedoc");
  const mockConfigPath = path.join(mockConfigDir, "config.json");

  beforeEach(() => {
    jest.clearAllMocks();
    mockedFs.existsSync.mockReturnValue(false);
    mockedFs.mkdirSync.mockImplementation();
    mockedFs.writeFileSync.mockImplementation();
  });

  describe("interactive mode", () => {
    it("should create config directory if it doesn't exist", async () => {
      mockPrompts.mockResolvedValue({ openai: "", anthropic: "", gemini: "", analyst: "openai/gpt-4o-mini" });

      const argv = { _: ["init"], $0: "changedoc" } as Arguments;
      await initCommand.handler!(argv);

      expect(mockedFs.mkdirSync).toHaveBeenCalledWith(mockConfigDir, { recursive: true });
    });

    it("should not recreate an existing config directory", async () => {
      mockedFs.existsSync.mockReturnValue(true);
      mockPrompts.mockResolvedValue({ openai: "", anthropic: "", gemini: "", analyst: "openai/gpt-4o-mini" });

      await initCommand.handler!({ _: ["init"], $0: "changedoc" } as Arguments);

      expect(mockedFs.mkdirSync).not.toHaveBeenCalled();
    });

    it("should save the chosen model with encrypted keys", async () => {
      mockPrompts.mockResolvedValue({
        openai: "test-openai-key",
        anthropic: "",
        gemini: "",
        analyst: "openai/gpt-4o",
      });

      await initCommand.handler!({ _: ["init"], $0: "changedoc" } as Arguments);

      expect(mockedFs.writeFileSync).toHaveBeenCalledWith(
        mockConfigPath,
        expect.stringContaining('"analyst": "openai/gpt-4o"'),
        "utf8",
      );
      const config = writtenConfig();
      expect(config.schemaVersion).toBe(1);
      expect(Object.keys(config.llm.keys)).toEqual(["openai"]);
      expect(config.llm.keys.openai).not.toContain("test-openai-key");
      expect(decryptSecret(config.llm.keys.openai)).toBe("test-openai-key");
      expect(config.pipeline.maxChunkSize).toBe(2000);
      expect(mockConsoleLog).toHaveBeenCalledWith(`Config saved to ${mockConfigPath}`);
    });
  });

  describe("non-interactive mode", () => {
    const savedEnv = { ...process.env };

    afterEach(() => {
      process.env = { ...savedEnv };
    });

    it("should read model and keys from env vars without prompting", async () => {
      process.env.CHANGEDOC_ANALYST_MODEL = "anthropic/claude-3-5-sonnet-latest";
      process.env.ANTHROPIC_API_KEY = "test-anthropic-key";
      delete process.env.OPENAI_API_KEY;
      delete process.env.GEMINI_API_KEY;

      await initCommand.handler!({ _: ["init"], $0: "changedoc", nonInteractive: true } as Arguments);

      expect(mockPrompts).not.toHaveBeenCalled();
      const config = writtenConfig();
      expect(config.llm.analyst).toBe("anthropic/claude-3-5-sonnet-latest");
      expect(Object.keys(config.llm.keys)).toEqual(["anthropic"]);
      expect(decryptSecret(config.llm.keys.anthropic)).toBe("test-anthropic-key");
    });

    it("should fall back to the default model", async () => {
      delete process.env.CHANGEDOC_ANALYST_MODEL;

      await initCommand.handler!({ _: ["init"], $0: "changedoc", nonInteractive: true } as Arguments);

      expect(writtenConfig().llm.analyst).toBe("openai/gpt-4o-mini");
    });
  });

  it("should describe the command", () => {
    expect(initCommand.command).toBe("init");
    expect(initCommand.describe).toBe("Interactive wizard for initial changedoc configuration");
  });
});
