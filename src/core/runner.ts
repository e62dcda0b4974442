import type { BaseLogger } from "pino";
import type { ComparisonRow, JobSpec, PolicyName } from "../types/index.js";
import { POLICY_ORDER } from "../constants.js";
import { getPolicy } from "./policies.js";
import { Scheduler } from "./scheduler.js";

export interface ComparisonOptions {
  policies?: readonly PolicyName[];
  logger?: BaseLogger;
}

/**
 * Runs each policy over fresh jobs built from the same specs and reports one
 * row per policy, in the order the policies were given.
 */
export function runComparison(
  specs: readonly JobSpec[],
  options: ComparisonOptions = {}
): ComparisonRow[] {
  const policies = options.policies ?? POLICY_ORDER;

  return policies.map((name) => {
    const metric = new Scheduler(specs, getPolicy(name)).run();
    options.logger?.debug({ policy: name, ...metric }, "policy run complete");

    return {
      policy: name,
      throughput: metric.throughput,
      meanTurnaround: metric.meanTurnaround,
      contextSwitches: metric.contextSwitches,
    };
  });
}
