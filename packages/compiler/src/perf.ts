const COMPILER_PERF_ENV = "ALDER_COMPILER_PERF";

/** Timings and counters gathered while building one environment. */
export interface CompilerPerfRecord {
  phasesMs: Record<string, number>;
  counters: Record<string, number>;
}

const isEnabledValue = (raw: string | undefined): boolean => {
  const normalized = raw?.trim().toLowerCase();
  return normalized === "1" || normalized === "true" || normalized === "yes";
};

/**
 * A fresh record when perf collection is switched on in `env`, otherwise
 * `undefined`; every helper below is a no-op without a record.
 */
export const createCompilerPerfRecord = (
  env: NodeJS.ProcessEnv = process.env,
): CompilerPerfRecord | undefined =>
  isEnabledValue(env[COMPILER_PERF_ENV])
    ? { phasesMs: {}, counters: {} }
    : undefined;

export const countCompilerPerf = (
  record: CompilerPerfRecord | undefined,
  name: string,
  amount = 1,
): void => {
  if (!record || amount === 0) {
    return;
  }
  record.counters[name] = (record.counters[name] ?? 0) + amount;
};

/** Runs `run`, adding its wall time to `phase` when a record is present. */
export const measureCompilerPhase = <T>(
  record: CompilerPerfRecord | undefined,
  phase: string,
  run: () => T,
): T => {
  if (!record) {
    return run();
  }
  const start = performance.now();
  try {
    return run();
  } finally {
    record.phasesMs[phase] =
      (record.phasesMs[phase] ?? 0) + (performance.now() - start);
  }
};

const sortedEntries = <V>(record: Readonly<Record<string, V>>) =>
  Object.entries(record).sort(([left], [right]) => left.localeCompare(right));

export const logEnvironmentPerfSummary = ({
  record,
  module,
  success,
  diagnostics,
}: {
  record: CompilerPerfRecord | undefined;
  module: string;
  success: boolean;
  diagnostics: number;
}): void => {
  if (!record) {
    return;
  }

  const summary = {
    module,
    success,
    diagnostics,
    phasesMs: Object.fromEntries(
      sortedEntries(record.phasesMs).map(([phase, ms]) => [
        phase,
        Math.round(ms * 1000) / 1000,
      ]),
    ),
    counters: Object.fromEntries(sortedEntries(record.counters)),
  };

  console.error(`[alder:compiler:perf] ${JSON.stringify(summary)}`);
};
