/**
 * Results JSON shared by the validate and score steps. Validation writes it
 * fresh; scoring reads it back and merges its own fields in.
 */

import fs from "node:fs";
import { z } from "zod";

export type ValidationStatus = "VALIDATED" | "INVALID";
export type ScoreStatus = "SCORED" | "INVALID";

export type ValidationRecord = {
  validation_status: ValidationStatus;
  validation_errors: string;
};

export type Scores = Record<string, number>;

export type ScoreRecord = ResultsRecord & {
  score_status: ScoreStatus;
  score_errors: string;
};

const resultsSchema = z
  .object({
    validation_status: z.string().catch(""),
    validation_errors: z.string().catch("")
  })
  .passthrough();

export type ResultsRecord = z.infer<typeof resultsSchema>;

function emptyResults(): ResultsRecord {
  return { validation_status: "", validation_errors: "" };
}

/**
 * Missing or unparsable files, or JSON that is not an object, read as an empty
 * record. A malformed status field falls back to "" on its own.
 */
export function readResults(filePath: string): ResultsRecord {
  let text: string;
  try {
    text = fs.readFileSync(filePath, "utf8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return emptyResults();
    }
    throw error;
  }
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch {
    return emptyResults();
  }
  const parsed = resultsSchema.safeParse(json);
  return parsed.success ? parsed.data : emptyResults();
}

export function writeResults(filePath: string, record: ResultsRecord | ValidationRecord): void {
  fs.writeFileSync(filePath, JSON.stringify(record), "utf8");
}
