import { z } from "zod";
import { MAX_REQUEST_TICKS } from "../constants.js";

export const policyNameSchema = z.enum(["fcfs", "sjf", "srtn", "round_robin"]);

export const jobInputSchema = z.object({
  id: z.number().int().safe(),
  submitted_at: z.number().int().min(0).max(MAX_REQUEST_TICKS),
  duration: z.number().int().positive().max(MAX_REQUEST_TICKS),
});

export const jobSpecSchema = z.object({
  id: z.number().int().safe(),
  submittedAt: z.number().int().min(0).safe(),
  duration: z.number().int().positive().safe(),
});

// Every tick either serves a job or waits for the latest arrival.
export const jobListSchema = z
  .array(jobInputSchema)
  .min(1)
  .superRefine((jobs, ctx) => {
    const horizon =
      Math.max(...jobs.map((j) => j.submitted_at)) +
      jobs.reduce((sum, j) => sum + j.duration, 0);
    if (horizon > MAX_REQUEST_TICKS) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `simulation needs up to ${horizon} ticks, limit is ${MAX_REQUEST_TICKS}`,
      });
    }
  });

export const simulateRequestSchema = z.object({
  jobs: jobListSchema,
  policies: z.array(policyNameSchema).min(1).optional(),
});

export const comparisonResultSchema = z.object({
  policy: policyNameSchema,
  throughput: z.number().positive(),
  mean_turnaround: z.number().positive(),
  context_switches: z.number().int().min(0),
});

export const comparisonOutputSchema = z.object({
  version: z.string(),
  success: z.literal(true),
  results: z.array(comparisonResultSchema),
});

export const failureOutputSchema = z.object({
  version: z.string(),
  success: z.literal(false),
  error: z.string(),
  why: z.array(z.string()),
});

export const simulateResultSchema = z.discriminatedUnion("success", [
  comparisonOutputSchema,
  failureOutputSchema,
]);
