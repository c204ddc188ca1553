import { afterEach, describe, expect, it, vi } from "vitest";
import {
  countCompilerPerf,
  createCompilerPerfRecord,
  logEnvironmentPerfSummary,
  measureCompilerPhase,
} from "../perf.js";

afterEach(() => {
  vi.restoreAllMocks();
});

describe("compiler perf records", () => {
  it("is switched on only by a truthy environment value", () => {
    expect(createCompilerPerfRecord({})).toBeUndefined();
    expect(createCompilerPerfRecord({ ALDER_COMPILER_PERF: "0" })).toBeUndefined();
    expect(createCompilerPerfRecord({ ALDER_COMPILER_PERF: " Yes " })).toEqual({
      phasesMs: {},
      counters: {},
    });
  });

  it("does nothing without a record", () => {
    const log = vi.spyOn(console, "error").mockImplementation(() => {});

    countCompilerPerf(undefined, "canonicalize.patches", 3);
    expect(measureCompilerPhase(undefined, "imports", () => 42)).toBe(42);
    logEnvironmentPerfSummary({
      record: undefined,
      module: "user/app::Main",
      success: true,
      diagnostics: 0,
    });

    expect(log).not.toHaveBeenCalled();
  });

  it("accumulates counters and phases per record", () => {
    const first = createCompilerPerfRecord({ ALDER_COMPILER_PERF: "1" });
    const second = createCompilerPerfRecord({ ALDER_COMPILER_PERF: "1" });

    countCompilerPerf(first, "canonicalize.patches", 3);
    countCompilerPerf(first, "canonicalize.patches", 2);
    countCompilerPerf(first, "canonicalize.imports", 0);
    expect(measureCompilerPhase(first, "imports", () => "done")).toBe("done");

    expect(first?.counters).toEqual({ "canonicalize.patches": 5 });
    expect(Object.keys(first?.phasesMs ?? {})).toEqual(["imports"]);
    expect(second).toEqual({ phasesMs: {}, counters: {} });
  });

  it("logs one sorted, rounded summary line", () => {
    const log = vi.spyOn(console, "error").mockImplementation(() => {});

    logEnvironmentPerfSummary({
      record: {
        phasesMs: { patches: 0.5, imports: 1.23456 },
        counters: { "canonicalize.patches": 4, "canonicalize.imports": 2 },
      },
      module: "user/app::Main",
      success: false,
      diagnostics: 1,
    });

    expect(log).toHaveBeenCalledWith(
      '[alder:compiler:perf] {"module":"user/app::Main","success":false,"diagnostics":1,"phasesMs":{"imports":1.235,"patches":0.5},"counters":{"canonicalize.imports":2,"canonicalize.patches":4}}'
    );
  });
});
