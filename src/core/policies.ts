import type {
  DispatchDecision,
  DispatchPolicy,
  Job,
  PolicyName,
} from "../types/index.js";

function unchanged(ready: readonly Job[], running: Job | null): DispatchDecision {
  return { running, ready: [...ready], switched: false };
}

/** Index of the first job with the smallest key; -1 for an empty queue. */
function indexOfMinimum(ready: readonly Job[], key: (job: Job) => number): number {
  let best = -1;
  for (let i = 0; i < ready.length; i++) {
    if (best === -1 || key(ready[i]) < key(ready[best])) {
      best = i;
    }
  }
  return best;
}

function without(ready: readonly Job[], index: number): Job[] {
  return ready.filter((_, i) => i !== index);
}

export const fcfs: DispatchPolicy = {
  name: "fcfs",
  preemptive: false,
  contextSwitch(ready, running) {
    if (running !== null || ready.length === 0) return unchanged(ready, running);

    const [head, ...rest] = ready;
    return { running: head, ready: rest, switched: true };
  },
};

export const sjf: DispatchPolicy = {
  name: "sjf",
  preemptive: false,
  contextSwitch(ready, running) {
    if (running !== null || ready.length === 0) return unchanged(ready, running);

    const index = indexOfMinimum(ready, (job) => job.totalDuration);
    return { running: ready[index], ready: without(ready, index), switched: true };
  },
};

export const srtn: DispatchPolicy = {
  name: "srtn",
  preemptive: true,
  contextSwitch(ready, running, admittedThisTick) {
    const index = indexOfMinimum(ready, (job) => job.remainingDuration);
    if (index === -1) return unchanged(ready, running);

    const candidate = ready[index];
    if (running === null) {
      return { running: candidate, ready: without(ready, index), switched: true };
    }

    if (candidate.remainingDuration < running.remainingDuration) {
      return {
        running: candidate,
        ready: [...without(ready, index), running],
        switched: true,
      };
    }

    // Arrivals force a re-evaluation that is counted even when the
    // running job keeps the processor.
    if (admittedThisTick) {
      return { running, ready: [...ready], switched: true };
    }

    return unchanged(ready, running);
  },
};

export const roundRobin: DispatchPolicy = {
  name: "round_robin",
  preemptive: true,
  contextSwitch(ready, running) {
    const queue = running === null ? [...ready] : [...ready, running];
    const [head = null, ...rest] = queue;
    return { running: head, ready: rest, switched: true };
  },
};

export const POLICIES: Readonly<Record<PolicyName, DispatchPolicy>> = {
  fcfs,
  sjf,
  srtn,
  round_robin: roundRobin,
};

export function getPolicy(name: PolicyName): DispatchPolicy {
  return POLICIES[name];
}

export function isPolicyName(value: string): value is PolicyName {
  return Object.prototype.hasOwnProperty.call(POLICIES, value);
}
