/**
 * Protocol strategies for chest-pain troponin triage.
 *
 * Every strategy shares one threshold classifier and returns a complete
 * disposition; the clinical safety net is applied on top of whichever strategy
 * ran. All randomness comes from the caller's random source.
 */

import { getPlatform } from "./platforms";
import type {
  Disposition,
  Outcome,
  PatientProfile,
  Platform,
  ProtocolConfig,
  ProtocolStrategyId,
  RandomSource,
} from "./types";

export type TroponinClass = "rule_out" | "rule_in" | "grey";

/** Absolute T0 below which a flat 1h delta still rules out. */
const LOW_T0_NG_L = 12;
const FLAT_DELTA_MAX = 3;
const RISING_DELTA_MIN = 5;
const SINGLE_SAMPLE_MAX_HEART = 3;
const SAFETY_NET_MIN_HEART = 4;
const RESCUE_PROBABILITY = 0.5;
/** Decision-maker delay when nobody is free to act on the result. */
const AVAILABILITY_PENALTY_MINUTES = 60;
const RETEST_INTERVAL_MINUTES = 60;

/**
 * ESC 0h/1h style classification. Rule out is checked before rule in, so a
 * patient meeting both (only possible with crossed thresholds) rules out.
 */
export function classifyTroponin(
  patient: Pick<PatientProfile, "t0" | "t1">,
  thresholds: Pick<ProtocolConfig, "ruleOutThreshold" | "ruleInThreshold">
): TroponinClass {
  const delta = patient.t1 - patient.t0;
  if (patient.t0 < thresholds.ruleOutThreshold || (patient.t0 < LOW_T0_NG_L && delta < FLAT_DELTA_MAX)) {
    return "rule_out";
  }
  if (patient.t0 > thresholds.ruleInThreshold || delta > RISING_DELTA_MIN) {
    return "rule_in";
  }
  return "grey";
}

const RULE_OUT_OUTCOMES: ReadonlySet<Outcome> = new Set<Outcome>([
  "RuleOut",
  "RuleOutSingleSample",
  "RuleOutSerial",
  "MissedUA",
]);

export function isRuleOutOutcome(outcome: Outcome): boolean {
  return RULE_OUT_OUTCOMES.has(outcome);
}

export type ProtocolContext = {
  patient: PatientProfile;
  config: ProtocolConfig;
  platform: Platform;
  resultReady: boolean;
  rng: RandomSource;
};

export interface ProtocolStrategy {
  id: ProtocolStrategyId;
  label: string;
  evaluate(ctx: ProtocolContext): Disposition;
}

function discharge(config: ProtocolConfig): string {
  return `Discharge (${config.dischargeDestination})`;
}

function pending(platform: Platform): Disposition {
  return {
    outcome: "Pending",
    action: "Bed Blocked (Wait)",
    waitMinutes: platform.turnaroundMinutes + AVAILABILITY_PENALTY_MINUTES,
    bedsBlocked: 1,
    testsUsed: 1,
  };
}

const escStrategy: ProtocolStrategy = {
  id: "esc_0h1h",
  label: "ESC 0h/1h",
  evaluate({ patient, config, platform, resultReady }) {
    if (!resultReady) return pending(platform);

    switch (classifyTroponin(patient, config)) {
      case "rule_out":
        return { outcome: "RuleOut", action: discharge(config), waitMinutes: 20, bedsBlocked: 0, testsUsed: 1 };
      case "rule_in":
        return { outcome: "RuleIn", action: "Cath Lab Transfer", waitMinutes: 60, bedsBlocked: 0, testsUsed: 1 };
      case "grey":
        return {
          outcome: "Observe",
          action: "Admit AMU (Serial Trop)",
          waitMinutes: 180,
          bedsBlocked: 1,
          testsUsed: 1,
        };
    }
  },
};

const macros2Strategy: ProtocolStrategy = {
  id: "macros2",
  label: "MACROS2 single sample",
  evaluate({ patient, config, platform, resultReady }) {
    if (!resultReady) return pending(platform);

    if (patient.heartScore <= SINGLE_SAMPLE_MAX_HEART && patient.t0 < config.ruleOutThreshold) {
      return {
        outcome: "RuleOutSingleSample",
        action: `Early Discharge (${config.dischargeDestination})`,
        waitMinutes: 15,
        bedsBlocked: 0,
        testsUsed: 1,
      };
    }
    if (patient.t0 > config.ruleInThreshold) {
      return { outcome: "RuleIn", action: "Cath Lab Transfer", waitMinutes: 60, bedsBlocked: 0, testsUsed: 1 };
    }
    return {
      outcome: "Observe",
      action: "Admit AMU (Too High Risk)",
      waitMinutes: 180,
      bedsBlocked: 1,
      testsUsed: 1,
    };
  },
};

/**
 * Waterfall: one test for everyone, optional single-sample exit for low-risk
 * patients, serial retest for the rest. Doctor availability is drawn here per
 * patient, so the runner's resultReady is not used.
 */
const waterfallStrategy: ProtocolStrategy = {
  id: "waterfall",
  label: "Waterfall (single sample + serial)",
  evaluate({ patient, config, platform, rng }) {
    let waitMinutes = platform.turnaroundMinutes;
    if (rng() > platform.availability) {
      waitMinutes += AVAILABILITY_PENALTY_MINUTES;
    }

    if (
      config.useSingleSample &&
      patient.t0 < config.ruleOutThreshold &&
      patient.heartScore <= SINGLE_SAMPLE_MAX_HEART
    ) {
      return {
        outcome: "RuleOutSingleSample",
        action: discharge(config),
        waitMinutes,
        bedsBlocked: 0,
        testsUsed: 1,
      };
    }

    waitMinutes += RETEST_INTERVAL_MINUTES + platform.turnaroundMinutes;
    switch (classifyTroponin(patient, config)) {
      case "rule_out":
        return { outcome: "RuleOutSerial", action: discharge(config), waitMinutes, bedsBlocked: 0, testsUsed: 2 };
      case "rule_in":
        return { outcome: "RuleIn", action: "Cath Lab Transfer", waitMinutes, bedsBlocked: 0, testsUsed: 2 };
      case "grey":
        return { outcome: "GreyZone", action: "Admit AMU (Serial Trop)", waitMinutes, bedsBlocked: 1, testsUsed: 2 };
    }
  },
};

export const PROTOCOL_STRATEGIES: Record<ProtocolStrategyId, ProtocolStrategy> = {
  esc_0h1h: escStrategy,
  macros2: macros2Strategy,
  waterfall: waterfallStrategy,
};

/**
 * Clinical judgement on top of the troponin rules: Unstable Angina has normal
 * troponin, so the numbers alone discharge it. A clinician spots a high HEART
 * score half the time; the rest are missed discharges, which the model keeps
 * so missed-diagnosis risk shows up in the metrics.
 */
export function applySafetyNet(
  patient: PatientProfile,
  disposition: Disposition,
  rng: RandomSource
): Disposition {
  if (patient.condition !== "UnstableAngina" || !isRuleOutOutcome(disposition.outcome)) {
    return disposition;
  }
  if (patient.heartScore >= SAFETY_NET_MIN_HEART && rng() < RESCUE_PROBABILITY) {
    return {
      outcome: "ClinicalRescue",
      action: "Admit (High Risk)",
      waitMinutes: 120,
      bedsBlocked: 1,
      testsUsed: disposition.testsUsed,
    };
  }
  return { ...disposition, outcome: "MissedUA" };
}

export function evaluateProtocol(
  patient: PatientProfile,
  config: ProtocolConfig,
  resultReady: boolean,
  rng: RandomSource
): Disposition {
  const platform = getPlatform(config.platform);
  const strategy = PROTOCOL_STRATEGIES[config.strategy];
  const disposition = strategy.evaluate({ patient, config, platform, resultReady, rng });
  return config.clinicalSafetyNet ? applySafetyNet(patient, disposition, rng) : disposition;
}
