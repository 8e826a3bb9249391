import { annualize, bedBlockRate, buildPathwayFlows, finalizeCosts, summarizeShift } from "../metrics";
import { emptyAggregate } from "../shiftRunner";
import type { PatientRecord, ShiftAggregate } from "../types";

function record(overrides: Partial<PatientRecord>): PatientRecord {
  return {
    id: 1,
    condition: "NonCardiac",
    heartScore: 1,
    t0: 2,
    t1: 2,
    t3: 2,
    outcome: "RuleOut",
    action: "Discharge (GP Surgery)",
    waitMinutes: 20,
    bedsBlocked: 0,
    testsUsed: 1,
    ...overrides,
  };
}

describe("finalizeCosts", () => {
  const aggregate: ShiftAggregate = {
    patientCount: 3,
    totalWaitMinutes: 300,
    bedsBlocked: 1,
    testCount: 3,
    testUnitCostTotal: 15,
  };

  it("prices waiting time at the combined staff rate plus kit cost", () => {
    expect(finalizeCosts(aggregate, 135, 30)).toEqual({
      staffCostPerMinute: 2.75,
      waitingMinutes: 300,
      waitingCost: 825,
      testCount: 3,
      testCost: 15,
      totalCost: 840,
      bedsBlocked: 1,
    });
  });

  it("returns the same total when run twice", () => {
    const first = finalizeCosts(aggregate, 150, 45);
    const second = finalizeCosts(aggregate, 150, 45);
    expect(second.totalCost).toBe(first.totalCost);
    expect(aggregate.totalWaitMinutes).toBe(300);
  });

  it("costs nothing for an empty shift", () => {
    expect(finalizeCosts(emptyAggregate(), 135, 30).totalCost).toBe(0);
  });
});

describe("annualize", () => {
  it("multiplies a daily figure by 365", () => {
    expect(annualize(840)).toBe(306600);
  });
});

describe("bedBlockRate", () => {
  it("is 0% with no patients", () => {
    expect(bedBlockRate(emptyAggregate())).toBe(0);
  });

  it("is blocked beds over patients as a percentage", () => {
    expect(bedBlockRate({ ...emptyAggregate(), patientCount: 4, bedsBlocked: 1 })).toBe(25);
  });
});

describe("summarizeShift", () => {
  const patients: PatientRecord[] = [
    record({ id: 1 }),
    record({ id: 2, condition: "UnstableAngina", heartScore: 6, outcome: "MissedUA" }),
    record({
      id: 3,
      condition: "UnstableAngina",
      heartScore: 5,
      outcome: "ClinicalRescue",
      action: "Admit (High Risk)",
      waitMinutes: 120,
      bedsBlocked: 1,
    }),
    record({ id: 4, condition: "NSTEMI", outcome: "RuleIn", action: "Cath Lab Transfer", waitMinutes: 60 }),
    record({
      id: 5,
      condition: "ChronicInjury",
      outcome: "Observe",
      action: "Admit AMU (Serial Trop)",
      waitMinutes: 180,
      bedsBlocked: 1,
    }),
    record({
      id: 6,
      condition: "UnstableAngina",
      heartScore: 7,
      outcome: "MissedUA",
      action: "Early Discharge (Virtual Ward)",
      waitMinutes: 15,
    }),
  ];
  const aggregate: ShiftAggregate = {
    patientCount: 6,
    totalWaitMinutes: 435,
    bedsBlocked: 2,
    testCount: 6,
    testUnitCostTotal: 30,
  };

  it("counts conditions, outcomes and missed unstable angina", () => {
    const metrics = summarizeShift(patients, aggregate);
    expect(metrics.byCondition).toEqual({ NSTEMI: 1, UnstableAngina: 3, ChronicInjury: 1, NonCardiac: 1 });
    expect(metrics.byOutcome.MissedUA).toBe(2);
    expect(metrics.byOutcome.RuleOut).toBe(1);
    expect(metrics.byOutcome.Pending).toBe(0);
    expect(metrics.missedUnstableAngina).toBe(2);
    expect(metrics.clinicalRescues).toBe(1);
    expect(metrics.trueNstemi).toBe(1);
    expect(metrics.chronicInjury).toBe(1);
  });

  it("projects bed days lost and flags critical bed blocking", () => {
    const metrics = summarizeShift(patients, aggregate);
    expect(metrics.bedBlockRatePct).toBeCloseTo(33.333, 2);
    expect(metrics.annualBedDaysLost).toBe(730);
    expect(metrics.criticalBedBlocking).toBe(false);
    expect(summarizeShift(patients, { ...aggregate, bedsBlocked: 3 }).criticalBedBlocking).toBe(true);
  });

  it("handles an empty shift", () => {
    const metrics = summarizeShift([], emptyAggregate());
    expect(metrics.patientCount).toBe(0);
    expect(metrics.bedBlockRatePct).toBe(0);
    expect(metrics.missedUnstableAngina).toBe(0);
  });
});

describe("buildPathwayFlows", () => {
  it("counts arrival, condition and outcome links in first-seen order", () => {
    const flows = buildPathwayFlows([
      record({ id: 1 }),
      record({ id: 2, condition: "NSTEMI", outcome: "RuleIn", action: "Cath Lab Transfer" }),
      record({ id: 3 }),
    ]);
    expect(flows).toEqual([
      { source: "Arrival", target: "NonCardiac", count: 2 },
      { source: "Arrival", target: "NSTEMI", count: 1 },
      { source: "NonCardiac", target: "RuleOut", count: 2 },
      { source: "NSTEMI", target: "RuleIn", count: 1 },
      { source: "RuleOut", target: "Discharge (GP Surgery)", count: 2 },
      { source: "RuleIn", target: "Cath Lab Transfer", count: 1 },
    ]);
  });

  it("is empty without patients", () => {
    expect(buildPathwayFlows([])).toEqual([]);
  });
});
