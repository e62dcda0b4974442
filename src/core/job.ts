import type { Job, JobOutcome, JobSpec } from "../types/index.js";
import { SimulationError } from "./errors.js";

export function createJob(spec: JobSpec): Job {
  return {
    id: spec.id,
    submittedAt: spec.submittedAt,
    totalDuration: spec.duration,
    remainingDuration: spec.duration,
    finishedAt: null,
  };
}

/** Fresh, independent jobs for one run; runs never share job state. */
export function createJobs(specs: readonly JobSpec[]): Job[] {
  return specs.map(createJob);
}

export function isFinished(job: Job): boolean {
  return job.remainingDuration <= 0;
}

function finishTick(job: Job): number {
  if (job.finishedAt === null) {
    throw new SimulationError(`Job ${job.id} has not finished`);
  }
  return job.finishedAt;
}

export function turnaround(job: Job): number {
  return finishTick(job) - job.submittedAt;
}

export function toOutcome(job: Job): JobOutcome {
  const finishedAt = finishTick(job);
  return {
    id: job.id,
    submittedAt: job.submittedAt,
    totalDuration: job.totalDuration,
    finishedAt,
    turnaround: finishedAt - job.submittedAt,
  };
}
