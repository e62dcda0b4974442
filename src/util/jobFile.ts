import { readFile } from "node:fs/promises";
import type { JobSpec } from "../types/index.js";
import { jobSpecSchema } from "../types/schemas.js";
import { JobFileError } from "../core/errors.js";

const INTEGER = /^-?\d+$/;

export function parseJobLine(line: string, lineNumber: number): JobSpec {
  const tokens = line.trim().split(/\s+/);
  if (tokens.length !== 3 || !tokens.every((t) => INTEGER.test(t))) {
    throw new JobFileError(
      `expected "<id> <submitted_at> <duration>" as integers, got "${line.trim()}"`,
      lineNumber
    );
  }

  const [id, submittedAt, duration] = tokens.map(Number);
  const parsed = jobSpecSchema.safeParse({ id, submittedAt, duration });
  if (!parsed.success) {
    const why = parsed.error.errors.map((e) => `${e.path.join(".")}: ${e.message}`);
    throw new JobFileError(why.join("; "), lineNumber);
  }
  return parsed.data;
}

export function parseJobFile(text: string): JobSpec[] {
  const specs: JobSpec[] = [];
  const lines = text.split(/\r?\n/);

  for (let i = 0; i < lines.length; i++) {
    if (lines[i].trim() === "") continue;
    specs.push(parseJobLine(lines[i], i + 1));
  }

  if (specs.length === 0) {
    throw new JobFileError("job file holds no jobs");
  }
  return specs;
}

export async function loadJobFile(path: string): Promise<JobSpec[]> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new JobFileError(`cannot read ${path}: ${reason}`);
  }
  return parseJobFile(text);
}
