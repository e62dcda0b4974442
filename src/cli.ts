#!/usr/bin/env node
import { existsSync, realpathSync } from "node:fs";
import { pathToFileURL } from "node:url";
import pino, { type Logger } from "pino";
import { loadConfig } from "./config.js";
import { isPolicyName } from "./core/policies.js";
import { runComparison } from "./core/runner.js";
import { SimulationError } from "./core/errors.js";
import { loadJobFile } from "./util/jobFile.js";
import { formatComparison } from "./util/report.js";
import { startServer } from "./api/server.js";

const USAGE = "usage: cpu-sched <jobs-file> [fcfs|sjf|srtn|round_robin ...] | cpu-sched serve";

export async function main(argv: string[], logger: Logger): Promise<number> {
  const [command, ...rest] = argv;
  if (command === undefined) {
    logger.error(USAGE);
    return 1;
  }

  if (command === "serve") {
    await startServer(loadConfig());
    return 0;
  }

  const unknown = rest.filter((name) => !isPolicyName(name));
  if (unknown.length > 0) {
    logger.error({ unknown }, `unknown policy; ${USAGE}`);
    return 1;
  }
  const policies = rest.filter(isPolicyName);

  try {
    const specs = await loadJobFile(command);
    logger.info({ file: command, jobs: specs.length }, "loaded jobs");

    const rows = runComparison(specs, {
      policies: policies.length > 0 ? policies : undefined,
      logger,
    });
    process.stdout.write(`${formatComparison(rows)}\n`);
    return 0;
  } catch (error) {
    if (error instanceof SimulationError) {
      logger.error(error.message);
      return 1;
    }
    throw error;
  }
}

const isEntryPoint =
  process.argv[1] !== undefined &&
  existsSync(process.argv[1]) &&
  import.meta.url === pathToFileURL(realpathSync(process.argv[1])).href;

if (isEntryPoint) {
  const config = loadConfig();
  const logger = pino({ level: config.LOG_LEVEL }, pino.destination(2));
  main(process.argv.slice(2), logger)
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      logger.fatal(error);
      process.exitCode = 1;
    });
}
