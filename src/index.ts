export * from "./types/index.js";
export { SIMULATOR_VERSION, POLICY_ORDER } from "./constants.js";
export { Scheduler } from "./core/scheduler.js";
export { runComparison, type ComparisonOptions } from "./core/runner.js";
export { POLICIES, getPolicy, isPolicyName, fcfs, sjf, srtn, roundRobin } from "./core/policies.js";
export { createJob, createJobs, turnaround } from "./core/job.js";
export {
  SimulationError,
  InvalidInputError,
  PolicyContractViolationError,
  JobFileError,
} from "./core/errors.js";
export { parseJobFile, loadJobFile } from "./util/jobFile.js";
export { formatComparison } from "./util/report.js";
export { buildApp, startServer } from "./api/server.js";
