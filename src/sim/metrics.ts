import type {
  Condition,
  FinancialSummary,
  Outcome,
  PatientRecord,
  ShiftAggregate,
} from "./types";

export const DAYS_PER_YEAR = 365;
/** Annual bed days lost above which the pathway is flagged as critical. */
export const CRITICAL_ANNUAL_BED_DAYS = 1000;

/**
 * Combine a finished shift with staffing rates (£/hr). Pure: same aggregate,
 * same rates, same numbers.
 */
export function finalizeCosts(
  aggregate: Readonly<ShiftAggregate>,
  consultantRatePerHr: number,
  nurseRatePerHr: number
): FinancialSummary {
  const staffCostPerMinute = (consultantRatePerHr + nurseRatePerHr) / 60;
  const waitingCost = aggregate.totalWaitMinutes * staffCostPerMinute;
  const testCost = aggregate.testUnitCostTotal;
  return {
    staffCostPerMinute,
    waitingMinutes: aggregate.totalWaitMinutes,
    waitingCost,
    testCount: aggregate.testCount,
    testCost,
    totalCost: waitingCost + testCost,
    bedsBlocked: aggregate.bedsBlocked,
  };
}

export function annualize(dailyValue: number): number {
  return dailyValue * DAYS_PER_YEAR;
}

/** Percentage of patients who blocked a bed; 0 for an empty shift. */
export function bedBlockRate(aggregate: Readonly<ShiftAggregate>): number {
  if (aggregate.patientCount === 0) return 0;
  return (aggregate.bedsBlocked / aggregate.patientCount) * 100;
}

export type ShiftMetrics = {
  patientCount: number;
  byCondition: Record<Condition, number>;
  byOutcome: Record<Outcome, number>;
  trueNstemi: number;
  chronicInjury: number;
  clinicalRescues: number;
  /** Unstable Angina patients sent home. */
  missedUnstableAngina: number;
  bedBlockRatePct: number;
  annualBedDaysLost: number;
  criticalBedBlocking: boolean;
};

function emptyConditionCounts(): Record<Condition, number> {
  return { NSTEMI: 0, UnstableAngina: 0, ChronicInjury: 0, NonCardiac: 0 };
}

function emptyOutcomeCounts(): Record<Outcome, number> {
  return {
    RuleOut: 0,
    RuleOutSingleSample: 0,
    RuleOutSerial: 0,
    RuleIn: 0,
    Observe: 0,
    GreyZone: 0,
    ClinicalRescue: 0,
    Pending: 0,
    MissedUA: 0,
  };
}

export function isDischarge(action: string): boolean {
  return action.includes("Discharge");
}

export function summarizeShift(
  patients: readonly PatientRecord[],
  aggregate: Readonly<ShiftAggregate>
): ShiftMetrics {
  const byCondition = emptyConditionCounts();
  const byOutcome = emptyOutcomeCounts();
  let missedUnstableAngina = 0;

  for (const p of patients) {
    byCondition[p.condition] += 1;
    byOutcome[p.outcome] += 1;
    if (p.condition === "UnstableAngina" && isDischarge(p.action)) {
      missedUnstableAngina += 1;
    }
  }

  const annualBedDaysLost = annualize(aggregate.bedsBlocked);
  return {
    patientCount: aggregate.patientCount,
    byCondition,
    byOutcome,
    trueNstemi: byCondition.NSTEMI,
    chronicInjury: byCondition.ChronicInjury,
    clinicalRescues: byOutcome.ClinicalRescue,
    missedUnstableAngina,
    bedBlockRatePct: bedBlockRate(aggregate),
    annualBedDaysLost,
    criticalBedBlocking: annualBedDaysLost > CRITICAL_ANNUAL_BED_DAYS,
  };
}

export type PathwayFlow = {
  source: string;
  target: string;
  count: number;
};

export const ARRIVAL_NODE = "Arrival";

/**
 * Link counts behind the pathway flow chart: arrival to condition, condition to
 * outcome, outcome to action. Links keep first-seen order within each stage.
 */
export function buildPathwayFlows(patients: readonly PatientRecord[]): PathwayFlow[] {
  const stages: Array<Map<string, PathwayFlow>> = [new Map(), new Map(), new Map()];
  const bump = (stage: Map<string, PathwayFlow>, source: string, target: string) => {
    const key = `${source}\u0000${target}`;
    const existing = stage.get(key);
    if (existing) {
      existing.count += 1;
    } else {
      stage.set(key, { source, target, count: 1 });
    }
  };

  for (const p of patients) {
    bump(stages[0], ARRIVAL_NODE, p.condition);
    bump(stages[1], p.condition, p.outcome);
    bump(stages[2], p.outcome, p.action);
  }

  return stages.flatMap((stage) => [...stage.values()]);
}
