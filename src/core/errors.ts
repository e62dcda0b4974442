export class SimulationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** The job set cannot be simulated: empty, or holding a malformed job. */
export class InvalidInputError extends SimulationError {
  constructor(readonly why: string[]) {
    super(`Invalid job set: ${why.join("; ")}`);
  }
}

/**
 * A dispatch policy picked a job outside the ready queue, or duplicated or
 * dropped a job. Never raised by a correct policy.
 */
export class PolicyContractViolationError extends SimulationError {
  constructor(readonly policy: string, detail: string) {
    super(`Policy ${policy} violated its contract: ${detail}`);
  }
}

export class JobFileError extends SimulationError {
  constructor(message: string, readonly line?: number) {
    super(line === undefined ? message : `line ${line}: ${message}`);
  }
}
