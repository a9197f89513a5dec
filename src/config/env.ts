import path from "node:path";
import dotenv from "dotenv";
import { z } from "zod";

dotenv.config({
  path: path.resolve(process.cwd(), ".env")
});

const envSchema = z.object({
  /** Results JSON path used when --output_file is not given. */
  RESULTS_FILE: z.string().min(1).default("results.json"),
  /** Char limit for validation_errors (the orchestrator emails it to participants). */
  VALIDATION_ERRORS_MAX_LENGTH: z.coerce.number().int().min(4).default(500)
});

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  const issueText = parsed.error.issues
    .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    .join("; ");
  throw new Error(`Invalid environment variables: ${issueText}`);
}

export const env = parsed.data;
