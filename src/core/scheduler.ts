import type {
  DispatchDecision,
  DispatchPolicy,
  ExecutionSlice,
  Job,
  JobSpec,
  PerformanceMetric,
  SchedulerOptions,
  SimulationReport,
  TickSnapshot,
} from "../types/index.js";
import { createJobs, isFinished, toOutcome, turnaround } from "./job.js";
import { InvalidInputError, PolicyContractViolationError } from "./errors.js";

function validateSpecs(specs: readonly JobSpec[]): void {
  if (specs.length === 0) {
    throw new InvalidInputError(["job set is empty"]);
  }

  const why: string[] = [];
  const seen = new Set<number>();
  for (const spec of specs) {
    if (!Number.isSafeInteger(spec.id)) {
      why.push(`job id ${spec.id} is not a safe integer`);
    } else if (seen.has(spec.id)) {
      why.push(`job id ${spec.id} is not unique`);
    }
    seen.add(spec.id);

    if (!Number.isSafeInteger(spec.duration) || spec.duration <= 0) {
      why.push(`job ${spec.id}: duration must be a positive safe integer, got ${spec.duration}`);
    }
    if (!Number.isSafeInteger(spec.submittedAt) || spec.submittedAt < 0) {
      why.push(`job ${spec.id}: arrival must be a non-negative safe integer, got ${spec.submittedAt}`);
    }
  }

  if (why.length > 0) throw new InvalidInputError(why);
}

function ids(jobs: readonly Job[]): number[] {
  return jobs.map((j) => j.id);
}

/**
 * Discrete-time single-processor simulation. One instance drives one run of
 * one policy over its own copy of the jobs.
 */
export class Scheduler {
  private pending: Job[];
  private ready: Job[] = [];
  private running: Job | null = null;
  private readonly finished: Job[] = [];

  private readonly totalJobs: number;
  private time = 0;
  private contextSwitches = 0;
  private metric: PerformanceMetric | null = null;
  private readonly timeline: ExecutionSlice[] = [];

  constructor(
    specs: readonly JobSpec[],
    private readonly policy: DispatchPolicy,
    private readonly options: SchedulerOptions = {}
  ) {
    validateSpecs(specs);
    this.pending = createJobs(specs);
    this.totalJobs = specs.length;
  }

  run(): PerformanceMetric {
    if (this.metric !== null) return this.metric;

    while (this.finished.length !== this.totalJobs) {
      const admitted = this.admit();
      const served = this.work();
      this.retire();
      const switched = this.dispatch(admitted);
      this.record(served);
      this.options.onTick?.(this.snapshot(served, switched));
      this.time++;
    }

    this.metric = this.computeMetric();
    return this.metric;
  }

  runDetailed(): SimulationReport {
    const metric = this.run();
    return {
      policy: this.policy.name,
      metric,
      jobs: this.finished.map(toOutcome).sort((a, b) => a.id - b.id),
      timeline: this.timeline.map((slice) => ({ ...slice })),
    };
  }

  private admit(): boolean {
    const arrived = this.pending.filter((job) => job.submittedAt <= this.time);
    if (arrived.length === 0) return false;

    this.pending = this.pending.filter((job) => job.submittedAt > this.time);
    this.ready.push(...arrived);
    return true;
  }

  private work(): number | null {
    if (this.running === null) return null;
    this.running.remainingDuration -= 1;
    return this.running.id;
  }

  private retire(): void {
    if (this.running === null || !isFinished(this.running)) return;

    this.running.finishedAt = this.time;
    this.finished.push(this.running);
    this.running = null;
  }

  private dispatch(admitted: boolean): boolean {
    const decision = this.policy.contextSwitch(this.ready, this.running, admitted);
    this.checkDecision(decision);

    this.ready = decision.ready;
    this.running = decision.running;
    if (decision.switched) this.contextSwitches++;
    return decision.switched;
  }

  private checkDecision(decision: DispatchDecision): void {
    const before = this.running === null ? [...this.ready] : [...this.ready, this.running];
    const after =
      decision.running === null ? [...decision.ready] : [...decision.ready, decision.running];

    if (decision.running !== null && !before.includes(decision.running)) {
      throw new PolicyContractViolationError(
        this.policy.name,
        `dispatched job ${decision.running.id}, which is neither ready nor running`
      );
    }
    if (decision.running !== null && decision.ready.includes(decision.running)) {
      throw new PolicyContractViolationError(
        this.policy.name,
        `job ${decision.running.id} is both running and ready`
      );
    }
    if (
      !this.policy.preemptive &&
      this.running !== null &&
      decision.running !== this.running
    ) {
      throw new PolicyContractViolationError(
        this.policy.name,
        `non-preemptive policy displaced running job ${this.running.id}`
      );
    }

    const unique = new Set(after);
    if (unique.size !== after.length || after.length !== before.length) {
      throw new PolicyContractViolationError(
        this.policy.name,
        `held jobs [${ids(before).join(", ")}] became [${ids(after).join(", ")}]`
      );
    }
    for (const job of before) {
      if (!unique.has(job)) {
        throw new PolicyContractViolationError(this.policy.name, `dropped job ${job.id}`);
      }
    }
  }

  private snapshot(served: number | null, switched: boolean): TickSnapshot {
    return Object.freeze({
      tick: this.time,
      pending: ids(this.pending),
      ready: ids(this.ready),
      running: this.running === null ? null : this.running.id,
      finished: ids(this.finished),
      served,
      switched,
    });
  }

  private computeMetric(): PerformanceMetric {
    const totalTurnaround = this.finished.reduce((sum, job) => sum + turnaround(job), 0);
    return Object.freeze({
      throughput: this.totalJobs / this.time,
      meanTurnaround: totalTurnaround / this.totalJobs,
      contextSwitches: this.contextSwitches,
      elapsedTicks: this.time,
    });
  }

  // Service performed at the start of tick t occupies the processor over [t-1, t).
  private record(served: number | null): void {
    if (served === null) return;

    const last = this.timeline[this.timeline.length - 1];
    if (last !== undefined && last.jobId === served && last.end === this.time - 1) {
      last.end = this.time;
    } else {
      this.timeline.push({ jobId: served, start: this.time - 1, end: this.time });
    }
  }
}
