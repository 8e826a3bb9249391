import { generateEventId, generateRunId } from "../idGenerator";
import { logError } from "../logger";
import type { EventLogger } from "./eventLog";
import { generatePatient } from "./patientGenerator";
import { getPlatform } from "./platforms";
import { evaluateProtocol } from "./protocols";
import { defaultRandom } from "./random";
import type {
  PatientRecord,
  RandomSource,
  ShiftAggregate,
  ShiftInput,
  ShiftOutput,
  SimEventEntry,
} from "./types";

export type RunShiftOptions = {
  rng?: RandomSource;
  eventLog?: EventLogger;
  runId?: string;
};

/** Chest-pain volume for the day: floor(census * pct / 100). */
export function dailyPatientCount(census: number, chestPainPct: number): number {
  if (!(census > 0) || !(chestPainPct > 0)) return 0;
  return Math.floor((census * chestPainPct) / 100);
}

export function emptyAggregate(): ShiftAggregate {
  return {
    patientCount: 0,
    totalWaitMinutes: 0,
    bedsBlocked: 0,
    testCount: 0,
    testUnitCostTotal: 0,
  };
}

/**
 * Simulate one 24h shift. Patients are independent; the only state carried
 * across the loop is the running aggregate. Zero volume yields an empty table.
 */
export function runShift(input: ShiftInput, options: RunShiftOptions = {}): ShiftOutput {
  const rng = options.rng ?? defaultRandom;
  const runId = options.runId ?? generateRunId();
  const emit = (type: SimEventEntry["type"], payload?: Record<string, unknown>) => {
    if (!options.eventLog) return;
    try {
      options.eventLog.append({ id: generateEventId(), ts: Date.now(), runId, type, payload });
    } catch (err) {
      logError("[sim-event] sink failed", type, err);
    }
  };

  const platform = getPlatform(input.protocol.platform);
  const patientCount = dailyPatientCount(input.census, input.chestPainPct);
  const aggregate = emptyAggregate();
  const patients: PatientRecord[] = [];

  emit("shift.started", {
    patientCount,
    strategy: input.protocol.strategy,
    platform: platform.id,
  });

  for (let id = 1; id <= patientCount; id++) {
    const profile = generatePatient(id, input.acsPrevalence, rng);
    const resultReady = rng() < platform.availability;
    const disposition = evaluateProtocol(profile, input.protocol, resultReady, rng);
    const record: PatientRecord = Object.freeze({ ...profile, ...disposition });
    patients.push(record);

    aggregate.patientCount += 1;
    aggregate.totalWaitMinutes += record.waitMinutes;
    aggregate.bedsBlocked += record.bedsBlocked;
    aggregate.testCount += record.testsUsed;
    aggregate.testUnitCostTotal += record.testsUsed * platform.unitCost;

    emit("patient.dispositioned", {
      patientId: id,
      condition: record.condition,
      outcome: record.outcome,
      waitMinutes: record.waitMinutes,
    });
  }

  emit("shift.completed", { ...aggregate });

  return {
    patients: Object.freeze(patients),
    aggregate: Object.freeze(aggregate),
    patientCount,
  };
}
