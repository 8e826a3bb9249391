import { logError } from "./logger";
import { simulate, type RunResult } from "./runResult";
import { ConfigValidationError, loadSimulationConfig } from "./simConfig";
import { ConsoleEventLog } from "./sim/eventLog";
import { annualize } from "./sim/metrics";

export type CliOptions = {
  configPath?: string;
  overrides: Record<string, unknown>;
  includePatients: boolean;
  events: boolean;
  pretty: boolean;
  help: boolean;
};

type FlagSpec = { key: string; kind: "number" | "string" };

const VALUE_FLAGS: Record<string, FlagSpec> = {
  "--census": { key: "dailyCensus", kind: "number" },
  "--chest-pain-pct": { key: "chestPainPct", kind: "number" },
  "--acs-prevalence": { key: "acsPrevalence", kind: "number" },
  "--platform": { key: "platform", kind: "string" },
  "--strategy": { key: "strategy", kind: "string" },
  "--rule-out": { key: "ruleOutThreshold", kind: "number" },
  "--rule-in": { key: "ruleInThreshold", kind: "number" },
  "--discharge-to": { key: "dischargeDestination", kind: "string" },
  "--consultant-rate": { key: "consultantRate", kind: "number" },
  "--nurse-rate": { key: "nurseRate", kind: "number" },
  "--seed": { key: "seed", kind: "number" },
};

const TOGGLE_FLAGS: Record<string, { key: string; value: boolean }> = {
  "--single-sample": { key: "useSingleSample", value: true },
  "--no-single-sample": { key: "useSingleSample", value: false },
  "--safety-net": { key: "clinicalSafetyNet", value: true },
  "--no-safety-net": { key: "clinicalSafetyNet", value: false },
};

export function parseArgs(args: string[]): CliOptions {
  const options: CliOptions = {
    overrides: {},
    includePatients: false,
    events: false,
    pretty: true,
    help: false,
  };

  for (let i = 0; i < args.length; i += 1) {
    const arg = args[i];
    if (arg === "--help" || arg === "-h") {
      options.help = true;
      continue;
    }
    if (arg === "--config") {
      options.configPath = requireValue(args, i);
      i += 1;
      continue;
    }
    const toggle = TOGGLE_FLAGS[arg];
    if (toggle) {
      options.overrides[toggle.key] = toggle.value;
      continue;
    }
    if (arg === "--patients") {
      options.includePatients = true;
      continue;
    }
    if (arg === "--events") {
      options.events = true;
      continue;
    }
    if (arg === "--compact") {
      options.pretty = false;
      continue;
    }
    const flag = VALUE_FLAGS[arg];
    if (flag) {
      const raw = requireValue(args, i);
      options.overrides[flag.key] = flag.kind === "number" ? toNumber(arg, raw) : raw;
      i += 1;
      continue;
    }
    throw new Error(`Unknown argument: ${arg}`);
  }

  return options;
}

function requireValue(args: string[], index: number): string {
  const value = args[index + 1];
  if (value === undefined || value.startsWith("--")) {
    throw new Error(`Missing value for ${args[index]}`);
  }
  return value;
}

function toNumber(flag: string, raw: string): number {
  const n = Number(raw);
  if (raw.trim() === "" || !Number.isFinite(n)) {
    throw new Error(`Expected a number for ${flag}, got "${raw}"`);
  }
  return n;
}

export function usage(): string {
  return [
    "Usage:",
    "  npm run simulate -- [--config <path-to-json>] [options]",
    "",
    "Options:",
    "  --census <n>             daily ED attendances",
    "  --chest-pain-pct <pct>   % presenting with chest pain",
    "  --acs-prevalence <pct>   % of chest pain that is NSTEMI",
    "  --platform <id>          CentralLab | PointOfCare",
    "  --strategy <id>          esc_0h1h | macros2 | waterfall",
    "  --rule-out <ng/L>        rule-out cutoff",
    "  --rule-in <ng/L>         rule-in cutoff",
    "  --single-sample          allow single-sample exit (waterfall)",
    "  --no-single-sample       serial testing for everyone (waterfall)",
    '  --discharge-to <dest>    "GP Surgery" | "Virtual Ward" | "RACPC Clinic"',
    "  --safety-net             enable clinical rescue of Unstable Angina",
    "  --no-safety-net          disable clinical rescue of Unstable Angina",
    "  --consultant-rate <gbp>  consultant cost per hour",
    "  --nurse-rate <gbp>       nurse cost per hour",
    "  --seed <int>             seed for a reproducible run",
    "  --patients               include the per-patient table",
    "  --events                 log sim events to the console",
    "  --compact                single-line JSON",
    "",
    "Example:",
    "  npm run simulate -- --platform PointOfCare --strategy waterfall --single-sample --seed 7",
  ].join("\n");
}

export function buildSummary(result: RunResult, includePatients: boolean) {
  return {
    runId: result.runId,
    createdAt: result.createdAt,
    configFingerprint: result.configFingerprint,
    config: result.config,
    financials: {
      ...result.financials,
      annualCost: annualize(result.financials.totalCost),
    },
    metrics: result.metrics,
    flows: result.flows,
    ...(includePatients ? { patients: result.patients } : {}),
  };
}

export function main(argv: string[], env: NodeJS.ProcessEnv = process.env): number {
  let options: CliOptions;
  try {
    options = parseArgs(argv);
  } catch (err) {
    logError(err instanceof Error ? err.message : err);
    process.stderr.write(`${usage()}\n`);
    return 1;
  }

  if (options.help) {
    process.stdout.write(`${usage()}\n`);
    return 0;
  }

  try {
    const config = loadSimulationConfig(options.configPath, env, options.overrides);
    const result = simulate(config, { eventLog: options.events ? new ConsoleEventLog() : undefined });
    const summary = buildSummary(result, options.includePatients);
    const json = options.pretty ? JSON.stringify(summary, null, 2) : JSON.stringify(summary);
    process.stdout.write(`${json}\n`);
    return 0;
  } catch (err) {
    if (err instanceof ConfigValidationError) {
      logError("[config]", ...err.issues);
    } else {
      logError("[simulate] failed", err);
    }
    return 1;
  }
}
