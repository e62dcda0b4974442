/**
 * Type Definitions for the CPU Scheduling Simulator
 *
 * NAMING CONVENTION:
 * - snake_case: Types that map to JSON (API request/response)
 * - camelCase: Internal-only types (never serialized, idiomatic TypeScript)
 *
 * TIME UNITS:
 * - All times and durations are in TICKS of the virtual clock, starting at 0
 */

// Input Types (JSON - snake_case)

export interface JobInput {
  id: number;
  submitted_at: number;
  duration: number;
}

export type PolicyName = "fcfs" | "sjf" | "srtn" | "round_robin";

export interface SimulateRequest {
  jobs: JobInput[];
  policies?: PolicyName[];
}

// Output Types (JSON - snake_case)

export interface ComparisonResult {
  policy: PolicyName;
  throughput: number;
  mean_turnaround: number;
  context_switches: number;
}

export interface JobResult {
  id: number;
  submitted_at: number;
  duration: number;
  finished_at: number;
  turnaround: number;
}

export interface SliceResult {
  job: number;
  start: number;
  end: number;
}

export interface ComparisonOutput {
  version: string;
  success: true;
  results: ComparisonResult[];
}

export interface DetailedOutput {
  version: string;
  success: true;
  policy: PolicyName;
  throughput: number;
  mean_turnaround: number;
  context_switches: number;
  elapsed_ticks: number;
  jobs: JobResult[];
  timeline: SliceResult[];
}

export interface FailureOutput {
  version: string;
  success: false;
  error: string;
  why: string[];
}

// Internal Types (camelCase)

/** Parsed, validated description of a job, shared by every policy run. */
export interface JobSpec {
  readonly id: number;
  readonly submittedAt: number;
  readonly duration: number;
}

/** Mutable per-run job state; owned by exactly one Scheduler. */
export interface Job {
  readonly id: number;
  readonly submittedAt: number;
  readonly totalDuration: number;
  remainingDuration: number;
  finishedAt: number | null;
}

export interface PerformanceMetric {
  readonly throughput: number;
  readonly meanTurnaround: number;
  readonly contextSwitches: number;
  readonly elapsedTicks: number;
}

export interface DispatchDecision {
  running: Job | null;
  ready: Job[];
  switched: boolean;
}

export interface DispatchPolicy {
  readonly name: PolicyName;
  readonly preemptive: boolean;
  contextSwitch(
    ready: readonly Job[],
    running: Job | null,
    admittedThisTick: boolean
  ): DispatchDecision;
}

export interface TickSnapshot {
  readonly tick: number;
  readonly pending: readonly number[];
  readonly ready: readonly number[];
  readonly running: number | null;
  readonly finished: readonly number[];
  /** Job that received a unit of service this tick, if any. */
  readonly served: number | null;
  readonly switched: boolean;
}

export interface SchedulerOptions {
  onTick?: (snapshot: TickSnapshot) => void;
}

export interface JobOutcome {
  id: number;
  submittedAt: number;
  totalDuration: number;
  finishedAt: number;
  turnaround: number;
}

/** Contiguous service of one job over ticks [start, end). */
export interface ExecutionSlice {
  jobId: number;
  start: number;
  end: number;
}

export interface SimulationReport {
  policy: PolicyName;
  metric: PerformanceMetric;
  jobs: JobOutcome[];
  timeline: ExecutionSlice[];
}

export interface ComparisonRow {
  policy: PolicyName;
  throughput: number;
  meanTurnaround: number;
  contextSwitches: number;
}
