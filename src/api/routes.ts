import type { FastifyInstance, FastifyRequest, FastifyReply } from "fastify";
import { ZodError } from "zod";
import { policyNameSchema, simulateRequestSchema } from "../types/schemas.js";
import type {
  ComparisonOutput,
  DetailedOutput,
  FailureOutput,
  JobInput,
  JobSpec,
  SimulationReport,
} from "../types/index.js";
import { runComparison } from "../core/runner.js";
import { Scheduler } from "../core/scheduler.js";
import { getPolicy } from "../core/policies.js";
import { InvalidInputError } from "../core/errors.js";
import { SIMULATOR_VERSION } from "../constants.js";

function normalizeJobs(jobs: JobInput[]): JobSpec[] {
  return jobs.map((j) => ({
    id: j.id,
    submittedAt: j.submitted_at,
    duration: j.duration,
  }));
}

function failure(error: string, why: string[]): FailureOutput {
  return { version: SIMULATOR_VERSION, success: false, error, why };
}

function denormalizeReport(report: SimulationReport): DetailedOutput {
  return {
    version: SIMULATOR_VERSION,
    success: true,
    policy: report.policy,
    throughput: report.metric.throughput,
    mean_turnaround: report.metric.meanTurnaround,
    context_switches: report.metric.contextSwitches,
    elapsed_ticks: report.metric.elapsedTicks,
    jobs: report.jobs.map((j) => ({
      id: j.id,
      submitted_at: j.submittedAt,
      duration: j.totalDuration,
      finished_at: j.finishedAt,
      turnaround: j.turnaround,
    })),
    timeline: report.timeline.map((s) => ({
      job: s.jobId,
      start: s.start,
      end: s.end,
    })),
  };
}

function sendError(fastify: FastifyInstance, reply: FastifyReply, error: unknown) {
  if (error instanceof ZodError) {
    return reply
      .status(400)
      .send(
        failure(
          "Invalid input",
          error.errors.map((e) => `${e.path.join(".")}: ${e.message}`)
        )
      );
  }

  if (error instanceof InvalidInputError) {
    return reply.status(400).send(failure("Invalid job set", error.why));
  }

  fastify.log.error(error);
  return reply
    .status(500)
    .send(failure("Internal server error", ["An unexpected error occurred"]));
}

export default async function routes(fastify: FastifyInstance) {
  fastify.post("/simulate", async (request: FastifyRequest, reply: FastifyReply) => {
    try {
      const input = simulateRequestSchema.parse(request.body);
      const rows = runComparison(normalizeJobs(input.jobs), {
        policies: input.policies,
        logger: request.log,
      });

      const output: ComparisonOutput = {
        version: SIMULATOR_VERSION,
        success: true,
        results: rows.map((r) => ({
          policy: r.policy,
          throughput: r.throughput,
          mean_turnaround: r.meanTurnaround,
          context_switches: r.contextSwitches,
        })),
      };
      return reply.send(output);
    } catch (error) {
      return sendError(fastify, reply, error);
    }
  });

  fastify.post<{ Params: { policy: string } }>(
    "/simulate/:policy",
    async (request, reply) => {
      const policy = policyNameSchema.safeParse(request.params.policy);
      if (!policy.success) {
        return reply
          .status(404)
          .send(
            failure("Unknown policy", [
              `${request.params.policy} is not one of ${policyNameSchema.options.join(", ")}`,
            ])
          );
      }

      try {
        const input = simulateRequestSchema.omit({ policies: true }).parse(request.body);
        const report = new Scheduler(
          normalizeJobs(input.jobs),
          getPolicy(policy.data)
        ).runDetailed();
        return reply.send(denormalizeReport(report));
      } catch (error) {
        return sendError(fastify, reply, error);
      }
    }
  );

  fastify.get("/health", async (_request, reply) => {
    return reply.send({ status: "ok", version: SIMULATOR_VERSION });
  });
}
