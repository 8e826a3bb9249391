export * from "./sim/types";
export { createWeightedSampler, defaultRandom, mulberry32, randInt } from "./sim/random";
export type { WeightTable } from "./sim/random";
export { PLATFORMS, getPlatform } from "./sim/platforms";
export {
  CHRONIC_INJURY_BAND_WIDTH,
  UNSTABLE_ANGINA_BAND_WIDTH,
  conditionBands,
  generatePatient,
  selectCondition,
} from "./sim/patientGenerator";
export {
  PROTOCOL_STRATEGIES,
  applySafetyNet,
  classifyTroponin,
  evaluateProtocol,
  isRuleOutOutcome,
} from "./sim/protocols";
export type { ProtocolContext, ProtocolStrategy, TroponinClass } from "./sim/protocols";
export { dailyPatientCount, emptyAggregate, runShift } from "./sim/shiftRunner";
export type { RunShiftOptions } from "./sim/shiftRunner";
export {
  annualize,
  bedBlockRate,
  buildPathwayFlows,
  finalizeCosts,
  summarizeShift,
} from "./sim/metrics";
export type { PathwayFlow, ShiftMetrics } from "./sim/metrics";
export { CompositeEventLog, ConsoleEventLog, InMemoryEventLog } from "./sim/eventLog";
export type { EventLogger } from "./sim/eventLog";
export {
  ConfigValidationError,
  fingerprintConfig,
  loadSimulationConfig,
  parseSimulationConfig,
  simulationConfigSchema,
  toShiftInput,
  validateSimulationConfig,
} from "./simConfig";
export type { SimulationConfig, SimulationConfigInput } from "./simConfig";
export { checkRunFreshness, simulate } from "./runResult";
export type { RunFreshness, RunResult, SimulateOptions } from "./runResult";
export { exportRun } from "./reportExport";
export type { ExportFormat, ExportOutcome, ReportExporter } from "./reportExport";
