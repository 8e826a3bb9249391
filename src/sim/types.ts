export type Condition = "NSTEMI" | "UnstableAngina" | "ChronicInjury" | "NonCardiac";

export type Outcome =
  | "RuleOut"
  | "RuleOutSingleSample"
  | "RuleOutSerial"
  | "RuleIn"
  | "Observe"
  | "GreyZone"
  | "ClinicalRescue"
  | "Pending"
  | "MissedUA";

export type PlatformId = "CentralLab" | "PointOfCare";

export type ProtocolStrategyId = "esc_0h1h" | "macros2" | "waterfall";

export type DischargeDestination = "GP Surgery" | "Virtual Ward" | "RACPC Clinic";

/** Uniform draw in [0, 1). */
export type RandomSource = () => number;

export type Platform = {
  id: PlatformId;
  label: string;
  unitCost: number;
  turnaroundMinutes: number;
  /** Chance a result is back and a decision-maker is free on the first pass. */
  availability: number;
};

export type PatientProfile = {
  id: number;
  condition: Condition;
  heartScore: number;
  t0: number;
  t1: number;
  /** Extrapolated 3h reading; informational only. */
  t3: number;
};

export type Disposition = {
  outcome: Outcome;
  action: string;
  waitMinutes: number;
  bedsBlocked: 0 | 1;
  testsUsed: 1 | 2;
};

export type PatientRecord = PatientProfile & Disposition;

export type ProtocolConfig = {
  strategy: ProtocolStrategyId;
  ruleOutThreshold: number;
  ruleInThreshold: number;
  platform: PlatformId;
  useSingleSample: boolean;
  dischargeDestination: DischargeDestination;
  clinicalSafetyNet: boolean;
};

export type ShiftAggregate = {
  patientCount: number;
  totalWaitMinutes: number;
  bedsBlocked: number;
  testCount: number;
  testUnitCostTotal: number;
};

export type ShiftInput = {
  census: number;
  chestPainPct: number;
  acsPrevalence: number;
  protocol: ProtocolConfig;
};

export type ShiftOutput = {
  patients: readonly PatientRecord[];
  aggregate: Readonly<ShiftAggregate>;
  patientCount: number;
};

export type FinancialSummary = {
  staffCostPerMinute: number;
  waitingMinutes: number;
  waitingCost: number;
  testCount: number;
  testCost: number;
  totalCost: number;
  bedsBlocked: number;
};

export type SimEventType = "shift.started" | "patient.dispositioned" | "shift.completed";

export type SimEventEntry = {
  id: string;
  ts: number;
  runId: string;
  type: SimEventType;
  payload?: Record<string, unknown>;
};
