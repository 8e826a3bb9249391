/**
 * Simulation configuration - single source of truth for defaults and ranges.
 *
 * Precedence (lowest to highest):
 * - schema defaults (typical NHS department, central lab, ESC 0h/1h)
 * - JSON config file
 * - TRIAGE_SIM_* environment variables
 */

import { createHash } from "crypto";
import { readFileSync } from "fs";
import { resolve } from "path";
import { z } from "zod";
import { log } from "./logger";
import type { ProtocolConfig, ShiftInput } from "./sim/types";

const percent = z.number().min(0).max(100);
const threshold = z.number().int().min(0);
const rate = z.number().min(0);

export const simulationConfigSchema = z
  .object({
    dailyCensus: z.number().int().min(0).default(250),
    chestPainPct: percent.default(10),
    acsPrevalence: percent.default(15),
    platform: z.enum(["CentralLab", "PointOfCare"]).default("CentralLab"),
    strategy: z.enum(["esc_0h1h", "macros2", "waterfall"]).default("esc_0h1h"),
    ruleOutThreshold: threshold.default(5),
    ruleInThreshold: threshold.default(52),
    useSingleSample: z.boolean().default(false),
    dischargeDestination: z.enum(["GP Surgery", "Virtual Ward", "RACPC Clinic"]).default("GP Surgery"),
    clinicalSafetyNet: z.boolean().default(true),
    consultantRate: rate.default(135),
    nurseRate: rate.default(30),
    seed: z.number().int().optional(),
  })
  .strict();

export type SimulationConfig = z.infer<typeof simulationConfigSchema>;
export type SimulationConfigInput = z.input<typeof simulationConfigSchema>;

export class ConfigValidationError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid simulation config: ${issues.join("; ")}`);
    this.name = "ConfigValidationError";
    this.issues = issues;
  }
}

export type ConfigParseResult =
  | { ok: true; config: SimulationConfig }
  | { ok: false; issues: string[] };

export function parseSimulationConfig(raw: unknown): ConfigParseResult {
  const parsed = simulationConfigSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    return {
      ok: false,
      issues: parsed.error.issues.map((issue) => {
        const path = issue.path.join(".");
        return path ? `${path}: ${issue.message}` : issue.message;
      }),
    };
  }
  return { ok: true, config: parsed.data };
}

/** Throws ConfigValidationError listing every problem. */
export function validateSimulationConfig(raw: unknown): SimulationConfig {
  const result = parseSimulationConfig(raw);
  if (!result.ok) throw new ConfigValidationError(result.issues);
  return result.config;
}

type EnvKind = "int" | "number" | "boolean" | "string";

const ENV_OVERRIDES: Record<string, { key: keyof SimulationConfig; kind: EnvKind }> = {
  TRIAGE_SIM_DAILY_CENSUS: { key: "dailyCensus", kind: "int" },
  TRIAGE_SIM_CHEST_PAIN_PCT: { key: "chestPainPct", kind: "number" },
  TRIAGE_SIM_ACS_PREVALENCE: { key: "acsPrevalence", kind: "number" },
  TRIAGE_SIM_PLATFORM: { key: "platform", kind: "string" },
  TRIAGE_SIM_STRATEGY: { key: "strategy", kind: "string" },
  TRIAGE_SIM_RULE_OUT: { key: "ruleOutThreshold", kind: "int" },
  TRIAGE_SIM_RULE_IN: { key: "ruleInThreshold", kind: "int" },
  TRIAGE_SIM_SINGLE_SAMPLE: { key: "useSingleSample", kind: "boolean" },
  TRIAGE_SIM_DISCHARGE_TO: { key: "dischargeDestination", kind: "string" },
  TRIAGE_SIM_SAFETY_NET: { key: "clinicalSafetyNet", kind: "boolean" },
  TRIAGE_SIM_CONSULTANT_RATE: { key: "consultantRate", kind: "number" },
  TRIAGE_SIM_NURSE_RATE: { key: "nurseRate", kind: "number" },
  TRIAGE_SIM_SEED: { key: "seed", kind: "int" },
};

/**
 * Coerce an environment string. Unparseable numbers and booleans are passed
 * through as strings so the schema reports them.
 */
export function coerceEnvValue(value: string, kind: EnvKind): unknown {
  const trimmed = value.trim();
  switch (kind) {
    case "int":
    case "number": {
      const n = Number(trimmed);
      return trimmed !== "" && Number.isFinite(n) ? n : trimmed;
    }
    case "boolean":
      if (/^(1|true|yes|on)$/i.test(trimmed)) return true;
      if (/^(0|false|no|off)$/i.test(trimmed)) return false;
      return trimmed;
    case "string":
      return trimmed;
  }
}

export function envOverrides(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const overrides: Record<string, unknown> = {};
  for (const [name, { key, kind }] of Object.entries(ENV_OVERRIDES)) {
    const value = env[name];
    if (value === undefined || value === "") continue;
    overrides[key] = coerceEnvValue(value, kind);
  }
  return overrides;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function readConfigFile(pathToJson: string): Record<string, unknown> {
  const absolutePath = resolve(pathToJson);
  const parsed: unknown = JSON.parse(readFileSync(absolutePath, "utf8"));
  if (!isRecord(parsed)) {
    throw new ConfigValidationError([`${absolutePath}: expected a JSON object`]);
  }
  return parsed;
}

export function loadSimulationConfig(
  pathToJson?: string,
  env: NodeJS.ProcessEnv = process.env,
  overrides: Record<string, unknown> = {}
): SimulationConfig {
  const fromFile = pathToJson ? readConfigFile(pathToJson) : {};
  const fromEnv = envOverrides(env);
  if (Object.keys(fromEnv).length > 0) {
    log("[config] environment overrides", Object.keys(fromEnv).join(", "));
  }
  return validateSimulationConfig({ ...fromFile, ...fromEnv, ...overrides });
}

export function toProtocolConfig(config: SimulationConfig): ProtocolConfig {
  return {
    strategy: config.strategy,
    ruleOutThreshold: config.ruleOutThreshold,
    ruleInThreshold: config.ruleInThreshold,
    platform: config.platform,
    useSingleSample: config.useSingleSample,
    dischargeDestination: config.dischargeDestination,
    clinicalSafetyNet: config.clinicalSafetyNet,
  };
}

export function toShiftInput(config: SimulationConfig): ShiftInput {
  return {
    census: config.dailyCensus,
    chestPainPct: config.chestPainPct,
    acsPrevalence: config.acsPrevalence,
    protocol: toProtocolConfig(config),
  };
}

function canonicalJson(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map(canonicalJson).join(",")}]`;
  }
  if (isRecord(value)) {
    const entries = Object.keys(value)
      .sort()
      .filter((key) => value[key] !== undefined)
      .map((key) => `${JSON.stringify(key)}:${canonicalJson(value[key])}`);
    return `{${entries.join(",")}}`;
  }
  return JSON.stringify(value);
}

/** sha256 over every config field, independent of key order. */
export function fingerprintConfig(config: SimulationConfig): string {
  return createHash("sha256").update(canonicalJson(config)).digest("hex");
}
