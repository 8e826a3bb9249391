import { generateRunId } from "./idGenerator";
import { fingerprintConfig, toShiftInput, type SimulationConfig } from "./simConfig";
import type { EventLogger } from "./sim/eventLog";
import { buildPathwayFlows, finalizeCosts, summarizeShift, type PathwayFlow, type ShiftMetrics } from "./sim/metrics";
import { defaultRandom, mulberry32 } from "./sim/random";
import { runShift } from "./sim/shiftRunner";
import type { FinancialSummary, PatientRecord, RandomSource, ShiftAggregate } from "./sim/types";

/**
 * Everything a presentation layer needs from one run, tagged with the
 * fingerprint of the config that produced it. Frozen once built.
 */
export type RunResult = {
  runId: string;
  createdAt: string;
  configFingerprint: string;
  config: Readonly<SimulationConfig>;
  patients: readonly PatientRecord[];
  aggregate: Readonly<ShiftAggregate>;
  financials: Readonly<FinancialSummary>;
  metrics: Readonly<ShiftMetrics>;
  flows: readonly Readonly<PathwayFlow>[];
};

export type SimulateOptions = {
  /** Overrides config.seed. */
  rng?: RandomSource;
  eventLog?: EventLogger;
  now?: () => Date;
};

export function simulate(config: SimulationConfig, options: SimulateOptions = {}): RunResult {
  const rng = options.rng ?? (config.seed !== undefined ? mulberry32(config.seed) : defaultRandom);
  const runId = generateRunId();
  const shift = runShift(toShiftInput(config), { rng, eventLog: options.eventLog, runId });
  const metrics = summarizeShift(shift.patients, shift.aggregate);

  // Snapshot the config so the fingerprint keeps describing what is stored.
  return Object.freeze({
    runId,
    createdAt: (options.now ?? (() => new Date()))().toISOString(),
    configFingerprint: fingerprintConfig(config),
    config: Object.freeze({ ...config }),
    patients: shift.patients,
    aggregate: shift.aggregate,
    financials: Object.freeze(finalizeCosts(shift.aggregate, config.consultantRate, config.nurseRate)),
    metrics: Object.freeze({
      ...metrics,
      byCondition: Object.freeze(metrics.byCondition),
      byOutcome: Object.freeze(metrics.byOutcome),
    }),
    flows: Object.freeze(buildPathwayFlows(shift.patients).map((flow) => Object.freeze(flow))),
  });
}

export type RunFreshness =
  | { status: "no_results" }
  | { status: "stale"; expected: string; actual: string }
  | { status: "current"; result: RunResult };

/**
 * Results may only be shown as current while the settings still match the run
 * that produced them.
 */
export function checkRunFreshness(result: RunResult | undefined, config: Readonly<SimulationConfig>): RunFreshness {
  if (!result) return { status: "no_results" };
  const actual = fingerprintConfig(config);
  if (actual !== result.configFingerprint) {
    return { status: "stale", expected: result.configFingerprint, actual };
  }
  return { status: "current", result };
}
