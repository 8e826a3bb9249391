import { createWeightedSampler, randInt } from "./random";
import type { Condition, PatientProfile, RandomSource } from "./types";

type Range = readonly [min: number, max: number];

type ConditionProfile = {
  heart: Range | "weighted";
  t0: Range;
  delta: Range;
};

/** Fixed band widths, in percentage points, after the NSTEMI band. */
export const UNSTABLE_ANGINA_BAND_WIDTH = 5;
export const CHRONIC_INJURY_BAND_WIDTH = 10;

const CONDITION_PROFILES: Record<Condition, ConditionProfile> = {
  // high score, high or rising troponin
  NSTEMI: { heart: [5, 10], t0: [20, 800], delta: [10, 100] },
  // ischaemia without necrosis: high score, normal troponin
  UnstableAngina: { heart: [4, 9], t0: [0, 10], delta: [0, 2] },
  // e.g. CKD: raised but flat troponin
  ChronicInjury: { heart: [3, 8], t0: [20, 60], delta: [0, 3] },
  NonCardiac: { heart: "weighted", t0: [0, 6], delta: [0, 1] },
};

const sampleNonCardiacHeartScore = createWeightedSampler<number>([
  [0, 30],
  [1, 30],
  [2, 20],
  [3, 10],
  [4, 5],
  [5, 5],
]);

const clampPct = (value: number) => Math.min(Math.max(value, 0), 100);

export type ConditionBands = {
  nstemiEnd: number;
  unstableAnginaEnd: number;
  chronicInjuryEnd: number;
};

/**
 * Band edges on the 0-100 draw scale. Edges past 100 are clamped, so a very
 * high prevalence squeezes NonCardiac (then ChronicInjury, then UA) to zero
 * width rather than wrapping round.
 */
export function conditionBands(acsPrevalence: number): ConditionBands {
  const nstemiEnd = clampPct(acsPrevalence);
  const unstableAnginaEnd = clampPct(nstemiEnd + UNSTABLE_ANGINA_BAND_WIDTH);
  const chronicInjuryEnd = clampPct(unstableAnginaEnd + CHRONIC_INJURY_BAND_WIDTH);
  return { nstemiEnd, unstableAnginaEnd, chronicInjuryEnd };
}

/** Map a draw in [0, 100) to its condition band. */
export function selectCondition(draw: number, acsPrevalence: number): Condition {
  const bands = conditionBands(acsPrevalence);
  if (draw < bands.nstemiEnd) return "NSTEMI";
  if (draw < bands.unstableAnginaEnd) return "UnstableAngina";
  if (draw < bands.chronicInjuryEnd) return "ChronicInjury";
  return "NonCardiac";
}

/**
 * Generate one synthetic chest-pain patient. Draw order is band, HEART score,
 * T0, delta; seeded runs rely on it.
 */
export function generatePatient(id: number, acsPrevalence: number, rng: RandomSource): PatientProfile {
  const condition = selectCondition(rng() * 100, acsPrevalence);
  const profile = CONDITION_PROFILES[condition];

  const heartScore =
    profile.heart === "weighted"
      ? sampleNonCardiacHeartScore(rng)
      : randInt(rng, profile.heart[0], profile.heart[1]);
  const t0 = randInt(rng, profile.t0[0], profile.t0[1]);
  const delta = randInt(rng, profile.delta[0], profile.delta[1]);

  return {
    id,
    condition,
    heartScore,
    t0,
    t1: t0 + delta,
    t3: t0 + delta * 2,
  };
}
