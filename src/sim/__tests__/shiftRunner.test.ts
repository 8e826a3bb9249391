import { CompositeEventLog, InMemoryEventLog, type EventLogger } from "../eventLog";
import { mulberry32 } from "../random";
import { dailyPatientCount, runShift } from "../shiftRunner";
import type { ProtocolConfig, ShiftInput } from "../types";
import { scriptedRandom } from "./scriptedRandom";

const protocol: ProtocolConfig = {
  strategy: "esc_0h1h",
  ruleOutThreshold: 5,
  ruleInThreshold: 52,
  platform: "CentralLab",
  useSingleSample: false,
  dischargeDestination: "GP Surgery",
  clinicalSafetyNet: true,
};

const input = (overrides: Partial<ShiftInput> = {}): ShiftInput => ({
  census: 250,
  chestPainPct: 10,
  acsPrevalence: 15,
  protocol,
  ...overrides,
});

describe("dailyPatientCount", () => {
  it("floors census times chest-pain percentage", () => {
    expect(dailyPatientCount(250, 10)).toBe(25);
    expect(dailyPatientCount(250, 8)).toBe(20);
    expect(dailyPatientCount(99, 10)).toBe(9);
  });

  it("floors without rounding up a near-whole product", () => {
    expect(dailyPatientCount(1, 99.9999999999)).toBe(0);
    expect(dailyPatientCount(250, 10.4)).toBe(26);
  });

  it("is zero when either input is zero", () => {
    expect(dailyPatientCount(0, 10)).toBe(0);
    expect(dailyPatientCount(250, 0)).toBe(0);
  });
});

describe("runShift", () => {
  it("returns an empty table and zeroed aggregate for zero volume", () => {
    const result = runShift(input({ census: 0 }), { rng: scriptedRandom() });
    expect(result.patientCount).toBe(0);
    expect(result.patients).toEqual([]);
    expect(result.aggregate).toEqual({
      patientCount: 0,
      totalWaitMinutes: 0,
      bedsBlocked: 0,
      testCount: 0,
      testUnitCostTotal: 0,
    });
  });

  it("simulates one patient end to end from scripted draws", () => {
    // band 50 -> NonCardiac, heart 0, t0 3, delta 0, result ready
    const rng = scriptedRandom(0.5, 0.1, 0.5, 0, 0.2);
    const result = runShift(input({ census: 10, chestPainPct: 10 }), { rng });
    expect(result.patients).toEqual([
      {
        id: 1,
        condition: "NonCardiac",
        heartScore: 0,
        t0: 3,
        t1: 3,
        t3: 3,
        outcome: "RuleOut",
        action: "Discharge (GP Surgery)",
        waitMinutes: 20,
        bedsBlocked: 0,
        testsUsed: 1,
      },
    ]);
    expect(result.aggregate).toEqual({
      patientCount: 1,
      totalWaitMinutes: 20,
      bedsBlocked: 0,
      testCount: 1,
      testUnitCostTotal: 5,
    });
    expect(rng.remaining()).toBe(0);
  });

  it("numbers 25 patients in arrival order and sums their records", () => {
    const result = runShift(input(), { rng: mulberry32(11) });
    expect(result.patientCount).toBe(25);
    expect(result.patients.map((p) => p.id)).toEqual(Array.from({ length: 25 }, (_, i) => i + 1));

    const waits = result.patients.reduce((sum, p) => sum + p.waitMinutes, 0);
    const beds = result.patients.reduce((sum, p) => sum + p.bedsBlocked, 0);
    expect(result.aggregate.patientCount).toBe(25);
    expect(result.aggregate.totalWaitMinutes).toBe(waits);
    expect(result.aggregate.bedsBlocked).toBe(beds);
    expect(result.aggregate.testCount).toBe(25);
    expect(result.aggregate.testUnitCostTotal).toBe(125);
  });

  it("is reproducible for a seed", () => {
    const a = runShift(input(), { rng: mulberry32(77) });
    const b = runShift(input(), { rng: mulberry32(77) });
    expect(a.patients).toEqual(b.patients);
    expect(a.aggregate).toEqual(b.aggregate);
  });

  it("charges a second kit for waterfall retests", () => {
    const waterfall: ProtocolConfig = { ...protocol, strategy: "waterfall", platform: "PointOfCare", useSingleSample: true };
    const result = runShift(input({ census: 1000, protocol: waterfall }), { rng: mulberry32(3) });
    const tests = result.patients.reduce((sum, p) => sum + p.testsUsed, 0);
    expect(result.aggregate.testCount).toBe(tests);
    expect(result.aggregate.testUnitCostTotal).toBe(tests * 30);
    expect(tests).toBeGreaterThan(100);
    expect(tests).toBeLessThan(200);
  });

  it("freezes its output", () => {
    const result = runShift(input(), { rng: mulberry32(1) });
    expect(Object.isFrozen(result.patients)).toBe(true);
    expect(Object.isFrozen(result.patients[0])).toBe(true);
    expect(Object.isFrozen(result.aggregate)).toBe(true);
  });

  it("reports start, one event per patient and completion", () => {
    const eventLog = new InMemoryEventLog();
    runShift(input({ census: 30 }), { rng: mulberry32(9), eventLog, runId: "run-test" });
    const events = eventLog.getRecent(100);
    expect(events).toHaveLength(5);
    expect(events.map((e) => e.type)).toEqual([
      "shift.started",
      "patient.dispositioned",
      "patient.dispositioned",
      "patient.dispositioned",
      "shift.completed",
    ]);
    expect(events.every((e) => e.runId === "run-test")).toBe(true);
    expect(events[0].payload).toEqual({ patientCount: 3, strategy: "esc_0h1h", platform: "CentralLab" });
    expect(events[1].payload?.patientId).toBe(1);
  });

  it("keeps running when an event sink throws", () => {
    const errorSpy = jest.spyOn(console, "error").mockImplementation(() => {});
    const broken: EventLogger = {
      append() {
        throw new Error("sink down");
      },
    };
    const memory = new InMemoryEventLog();
    const result = runShift(input({ census: 20 }), {
      rng: mulberry32(4),
      eventLog: new CompositeEventLog(broken, memory),
    });
    expect(result.patientCount).toBe(2);
    expect(memory.getRecent()).toHaveLength(4);
    expect(errorSpy).toHaveBeenCalledTimes(4);
    errorSpy.mockRestore();
  });

  it("logs and skips a bare sink that throws", () => {
    const errorSpy = jest.spyOn(console, "error").mockImplementation(() => {});
    const broken: EventLogger = {
      append() {
        throw new Error("sink down");
      },
    };
    const result = runShift(input(), { rng: mulberry32(4), eventLog: broken });
    expect(result.patientCount).toBe(25);
    expect(result.patients).toHaveLength(25);
    expect(errorSpy).toHaveBeenCalledTimes(27);
    expect(errorSpy.mock.calls[0].slice(1, 3)).toEqual(["[sim-event] sink failed", "shift.started"]);
    errorSpy.mockRestore();
  });
});
