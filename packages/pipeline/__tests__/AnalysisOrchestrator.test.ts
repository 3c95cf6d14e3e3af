import {
  AnalysisError,
  InputError,
  SubmissionCancelledError,
  SubmissionFailureError,
  type AnalysisResult,
  type PromptUnit,
} from "@changedoc/common";
import { chunkText } from "../src/services/chunker";
import { assemblePromptUnit } from "../src/services/pairingAssembler";
import {
  FAILED_SECTION_PREFIX,
  analyzeUnits,
  toRenderableSections,
  type AnalysisCall,
  type OrchestratorOptions,
  type UnitAnalyst,
} from "../src/services/AnalysisOrchestrator";

const story = { name: "Story", description: "Description" };

function makeUnits(count: number, hasOriginal = false): PromptUnit[] {
  return chunkText("a".repeat(count * 10), 10, 0).map((chunk) =>
    assemblePromptUnit(chunk, { spans: [], truncated: false }, story, "", 1000, hasOriginal),
  );
}

function analystOf(fn: (unit: PromptUnit, call: AnalysisCall) => Promise<string>): UnitAnalyst & {
  analyzeUnit: jest.Mock<Promise<string>, [PromptUnit, AnalysisCall]>;
} {
  return { analyzeUnit: jest.fn(fn) };
}

const delay = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

const options: OrchestratorOptions = { concurrency: 3, retryLimit: 2, timeoutMs: 1000, backoffMs: 0 };

describe("analyzeUnits", () => {
  let warnSpy: jest.SpyInstance;

  beforeEach(() => {
    warnSpy = jest.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    warnSpy.mockRestore();
  });

  describe("ordering", () => {
    test("orders sections by unit index regardless of completion order", async () => {
      const analyst = analystOf(async (unit) => {
        await delay((3 - unit.index) * 15);
        return `analysis ${unit.index}`;
      });
      const completionOrder: number[] = [];

      const document = await analyzeUnits(makeUnits(3), analyst, {
        ...options,
        onProgress: (result) => completionOrder.push(result.index),
      });

      expect(completionOrder).toEqual([2, 1, 0]);
      expect(document.sections.map((s) => s.body)).toEqual(["analysis 0", "analysis 1", "analysis 2"]);
      expect(document.sections.map((s) => s.heading)).toEqual(["Section 1 of 3", "Section 2 of 3", "Section 3 of 3"]);
      expect(document.overview).toBe(
        "The modified code was split into 3 sections for analysis. Each section below covers one contiguous part of the change, in order.",
      );
      expect(document.chunkCount).toBe(3);
      expect(document.failedCount).toBe(0);
    });

    test("a single unit gets no overview", async () => {
      const document = await analyzeUnits(makeUnits(1), analystOf(async () => "## Solution\nDone"), options);

      expect(document.overview).toBeUndefined();
      expect(document.sections).toEqual([{ index: 0, heading: "Code Analysis", body: "## Solution\nDone", status: "analysed" }]);
    });
  });

  describe("bounded concurrency", () => {
    test("never has more calls in flight than the pool width", async () => {
      let inFlight = 0;
      let peak = 0;
      const analyst = analystOf(async (unit) => {
        inFlight++;
        peak = Math.max(peak, inFlight);
        await delay(5);
        inFlight--;
        return `ok ${unit.index}`;
      });

      await analyzeUnits(makeUnits(5), analyst, { ...options, concurrency: 2 });

      expect(peak).toBe(2);
      expect(analyst.analyzeUnit).toHaveBeenCalledTimes(5);
    });
  });

  describe("failures", () => {
    test("one unit failing every retry becomes a placeholder", async () => {
      const analyst = analystOf(async (unit) => {
        if (unit.index === 1) throw new AnalysisError("model unavailable");
        return `analysis ${unit.index}`;
      });

      const document = await analyzeUnits(makeUnits(3), analyst, options);

      expect(document.sections).toHaveLength(3);
      expect(document.sections.map((s) => s.status)).toEqual(["analysed", "failed", "analysed"]);
      expect(document.sections[1].body).toBe(`${FAILED_SECTION_PREFIX} model unavailable`);
      expect(document.sections[0].body).toBe("analysis 0");
      expect(document.sections[2].body).toBe("analysis 2");
      expect(document.failedCount).toBe(1);
      expect(document.overview).toContain("1 of them could not be analysed.");

      const callsForFailed = analyst.analyzeUnit.mock.calls.filter(([unit]) => unit.index === 1);
      expect(callsForFailed.map(([, call]) => call.attempt)).toEqual([1, 2, 3]);
      expect(warnSpy).toHaveBeenCalledWith("Analysis attempt 3/3 for section 2 failed: model unavailable");
    });

    test("a retry that succeeds keeps the real analysis", async () => {
      let calls = 0;
      const analyst = analystOf(async () => {
        calls++;
        if (calls === 1) throw new AnalysisError("flaky");
        return "recovered";
      });
      const results: AnalysisResult[] = [];

      const document = await analyzeUnits(makeUnits(1), analyst, {
        ...options,
        onProgress: (result) => results.push(result),
      });

      expect(document.sections[0].body).toBe("recovered");
      expect(results[0]).toMatchObject({ status: "analysed", attempts: 2 });
    });

    test("a blank response counts as a failure", async () => {
      const analyst = analystOf(async (unit) => (unit.index === 0 ? "   " : "fine"));

      const document = await analyzeUnits(makeUnits(2), analyst, { ...options, retryLimit: 0 });

      expect(document.sections[0].body).toBe(`${FAILED_SECTION_PREFIX} Analyst returned an empty response`);
    });

    test("a call exceeding the timeout fails and is aborted", async () => {
      const aborted: boolean[] = [];
      const analyst = analystOf(
        (unit, call) =>
          new Promise<string>((resolve, reject) => {
            if (unit.index === 1) {
              resolve("fast");
              return;
            }
            call.signal.addEventListener("abort", () => {
              aborted.push(true);
              reject(new Error("aborted"));
            });
          }),
      );

      const document = await analyzeUnits(makeUnits(2), analyst, { ...options, retryLimit: 0, timeoutMs: 20 });

      expect(document.sections[0]).toMatchObject({
        status: "failed",
        body: `${FAILED_SECTION_PREFIX} Analysis call timed out after 20ms`,
      });
      expect(document.sections[1].body).toBe("fast");
      expect(aborted).toEqual([true]);
    });

    test("an analyst that throws synchronously fails the attempt and clears its timer", async () => {
      const clearSpy = jest.spyOn(global, "clearTimeout");
      const analyst: UnitAnalyst = {
        analyzeUnit: jest.fn((unit: PromptUnit) => {
          if (unit.index === 0) throw new AnalysisError("bad request");
          return Promise.resolve("fine");
        }),
      };

      const document = await analyzeUnits(makeUnits(2), analyst, {
        ...options,
        concurrency: 1,
        retryLimit: 0,
        timeoutMs: 60_000,
      });

      expect(document.sections.map((section) => section.status)).toEqual(["failed", "analysed"]);
      expect(document.sections[0].body).toBe(`${FAILED_SECTION_PREFIX} bad request`);
      expect(clearSpy).toHaveBeenCalledTimes(2);
      clearSpy.mockRestore();
    });

    test("every unit failing is a submission failure", async () => {
      const analyst = analystOf(async () => {
        throw new AnalysisError("down");
      });

      const run = analyzeUnits(makeUnits(3), analyst, { ...options, retryLimit: 1 });

      await expect(run).rejects.toThrow(SubmissionFailureError);
      await expect(run).rejects.toMatchObject({
        failures: [
          { index: 0, reason: "down" },
          { index: 1, reason: "down" },
          { index: 2, reason: "down" },
        ],
      });
    });
  });

  describe("cancellation", () => {
    test("aborting the submission abandons in-flight calls", async () => {
      const controller = new AbortController();
      const analyst = analystOf(
        () =>
          new Promise<string>(() => {
            setTimeout(() => controller.abort(), 5);
          }),
      );

      await expect(
        analyzeUnits(makeUnits(3), analyst, { ...options, signal: controller.signal }),
      ).rejects.toThrow(SubmissionCancelledError);
    });

    test("aborting during a retry backoff rejects without waiting it out", async () => {
      const controller = new AbortController();
      const analyst = analystOf(async () => {
        throw new AnalysisError("down");
      });
      setTimeout(() => controller.abort(), 50);
      const started = Date.now();

      await expect(
        analyzeUnits(makeUnits(1), analyst, { ...options, backoffMs: 3000, signal: controller.signal }),
      ).rejects.toThrow(SubmissionCancelledError);

      expect(Date.now() - started).toBeLessThan(1000);
      expect(analyst.analyzeUnit).toHaveBeenCalledTimes(1);
    });

    test("an already aborted signal starts nothing", async () => {
      const controller = new AbortController();
      controller.abort();
      const analyst = analystOf(async () => "never");

      await expect(analyzeUnits(makeUnits(2), analyst, { ...options, signal: controller.signal })).rejects.toThrow(
        SubmissionCancelledError,
      );
      expect(analyst.analyzeUnit).not.toHaveBeenCalled();
    });
  });

  test("rejects an empty unit list", async () => {
    await expect(analyzeUnits([], analystOf(async () => "x"), options)).rejects.toThrow(InputError);
  });
});

describe("toRenderableSections", () => {
  test("puts the overview and notes ahead of the sections", async () => {
    const document = await analyzeUnits(
      makeUnits(2, false),
      analystOf(async (unit) => `body ${unit.index}`),
      { concurrency: 1, retryLimit: 0, timeoutMs: 1000, backoffMs: 0 },
    );

    expect(toRenderableSections(document)).toEqual([
      { heading: "Overview", body: document.overview },
      { heading: "Notes", body: "- No original file was supplied; the analysis is based on the modified code only." },
      { heading: "Section 1 of 2", body: "body 0" },
      { heading: "Section 2 of 2", body: "body 1" },
    ]);
  });
});
