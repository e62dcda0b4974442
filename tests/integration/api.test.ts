import { describe, it, expect, beforeAll, afterAll } from "vitest";
import type { FastifyInstance } from "fastify";
import { buildApp } from "../../src/api/server.js";
import { simulateResultSchema } from "../../src/types/schemas.js";
import type { SimulateRequest } from "../../src/types/index.js";

describe("API Integration Tests", () => {
  let app: FastifyInstance;

  beforeAll(async () => {
    app = buildApp({ LOG_LEVEL: "silent", PORT: 3000, HOST: "127.0.0.1" });
    await app.ready();
  });

  afterAll(async () => {
    await app.close();
  });

  const sampleInput: SimulateRequest = {
    jobs: [
      { id: 1, submitted_at: 0, duration: 5 },
      { id: 2, submitted_at: 0, duration: 2 },
      { id: 3, submitted_at: 0, duration: 8 },
      { id: 4, submitted_at: 0, duration: 1 },
    ],
  };

  describe("POST /simulate", () => {
    it("compares every policy for sample input", async () => {
      const response = await app.inject({
        method: "POST",
        url: "/simulate",
        payload: sampleInput,
      });

      expect(response.statusCode).toBe(200);

      const result = simulateResultSchema.parse(response.json());
      expect(result.success).toBe(true);
      if (!result.success) return;

      expect(result.version).toBe("1.0.0");
      expect(result.results).toEqual([
        { policy: "fcfs", throughput: 4 / 17, mean_turnaround: 10.75, context_switches: 4 },
        { policy: "sjf", throughput: 4 / 17, mean_turnaround: 7, context_switches: 4 },
        { policy: "srtn", throughput: 4 / 17, mean_turnaround: 7, context_switches: 4 },
        { policy: "round_robin", throughput: 4 / 17, mean_turnaround: 9.5, context_switches: 17 },
      ]);
    });

    it("runs only the requested policies", async () => {
      const response = await app.inject({
        method: "POST",
        url: "/simulate",
        payload: { ...sampleInput, policies: ["sjf"] },
      });

      expect(response.statusCode).toBe(200);
      expect(response.json().results).toEqual([
        { policy: "sjf", throughput: 4 / 17, mean_turnaround: 7, context_switches: 4 },
      ]);
    });

    it("returns 400 for an empty job list", async () => {
      const response = await app.inject({
        method: "POST",
        url: "/simulate",
        payload: { jobs: [] },
      });

      expect(response.statusCode).toBe(400);

      const result = response.json();
      expect(result.success).toBe(false);
      expect(result.error).toBe("Invalid input");
      expect(result.why).toEqual(["jobs: Array must contain at least 1 element(s)"]);
    });

    it("returns 400 for a non-positive duration", async () => {
      const response = await app.inject({
        method: "POST",
        url: "/simulate",
        payload: { jobs: [{ id: 1, submitted_at: 0, duration: 0 }] },
      });

      expect(response.statusCode).toBe(400);
      expect(response.json().why).toEqual(["jobs.0.duration: Number must be greater than 0"]);
    });

    it("returns 400 for an arrival beyond the tick limit", async () => {
      const response = await app.inject({
        method: "POST",
        url: "/simulate",
        payload: { jobs: [{ id: 1, submitted_at: 1e15, duration: 1 }] },
      });

      expect(response.statusCode).toBe(400);
      expect(response.json().error).toBe("Invalid input");
      expect(response.json().why).toContain(
        "jobs.0.submitted_at: Number must be less than or equal to 1000000"
      );
    });

    it("returns 400 when the jobs together exceed the tick limit", async () => {
      const response = await app.inject({
        method: "POST",
        url: "/simulate/fcfs",
        payload: {
          jobs: [
            { id: 1, submitted_at: 0, duration: 600000 },
            { id: 2, submitted_at: 0, duration: 600000 },
          ],
        },
      });

      expect(response.statusCode).toBe(400);
      expect(response.json().why).toEqual([
        "jobs: simulation needs up to 1200000 ticks, limit is 1000000",
      ]);
    });

    it("returns 400 for an id beyond the safe integer range", async () => {
      const response = await app.inject({
        method: "POST",
        url: "/simulate",
        payload: '{"jobs":[{"id":9007199254740993,"submitted_at":0,"duration":1}]}',
        headers: { "content-type": "application/json" },
      });

      expect(response.statusCode).toBe(400);
      expect(response.json().why).toEqual([
        "jobs.0.id: Number must be less than or equal to 9007199254740991",
      ]);
    });

    it("returns 400 for duplicate job ids", async () => {
      const response = await app.inject({
        method: "POST",
        url: "/simulate",
        payload: {
          jobs: [
            { id: 1, submitted_at: 0, duration: 2 },
            { id: 1, submitted_at: 1, duration: 3 },
          ],
        },
      });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toEqual({
        version: "1.0.0",
        success: false,
        error: "Invalid job set",
        why: ["job id 1 is not unique"],
      });
    });

    it("returns 400 for an unknown policy in the list", async () => {
      const response = await app.inject({
        method: "POST",
        url: "/simulate",
        payload: { ...sampleInput, policies: ["lottery"] },
      });

      expect(response.statusCode).toBe(400);
      expect(response.json().error).toBe("Invalid input");
    });

    it("returns correct content-type header", async () => {
      const response = await app.inject({
        method: "POST",
        url: "/simulate",
        payload: sampleInput,
      });

      expect(response.headers["content-type"]).toContain("application/json");
    });
  });

  describe("POST /simulate/:policy", () => {
    it("returns per-job outcomes and the timeline", async () => {
      const response = await app.inject({
        method: "POST",
        url: "/simulate/srtn",
        payload: {
          jobs: [
            { id: 1, submitted_at: 0, duration: 10 },
            { id: 2, submitted_at: 1, duration: 2 },
          ],
        },
      });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({
        version: "1.0.0",
        success: true,
        policy: "srtn",
        throughput: 2 / 13,
        mean_turnaround: 7,
        context_switches: 3,
        elapsed_ticks: 13,
        jobs: [
          { id: 1, submitted_at: 0, duration: 10, finished_at: 12, turnaround: 12 },
          { id: 2, submitted_at: 1, duration: 2, finished_at: 3, turnaround: 2 },
        ],
        timeline: [
          { job: 1, start: 0, end: 1 },
          { job: 2, start: 1, end: 3 },
          { job: 1, start: 3, end: 12 },
        ],
      });
    });

    it("returns 404 for an unknown policy", async () => {
      const response = await app.inject({
        method: "POST",
        url: "/simulate/lottery",
        payload: sampleInput,
      });

      expect(response.statusCode).toBe(404);
      expect(response.json()).toEqual({
        version: "1.0.0",
        success: false,
        error: "Unknown policy",
        why: ["lottery is not one of fcfs, sjf, srtn, round_robin"],
      });
    });
  });

  describe("GET /health", () => {
    it("returns health status", async () => {
      const response = await app.inject({
        method: "GET",
        url: "/health",
      });

      expect(response.statusCode).toBe(200);

      const result = response.json();
      expect(result.status).toBe("ok");
      expect(result.version).toBe("1.0.0");
    });
  });
});
