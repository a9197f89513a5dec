/**
 * Option parsing shared by the validate and score commands.
 * Option names keep their underscores; the orchestrator passes them verbatim.
 */

import { z } from "zod";
import { env } from "../config/env";
import type { WorkflowOptions } from "../services/validation/validate";
import { UsageError } from "../utils/cliError";

type OptionKey = "predictions_file" | "goldstandard_folder" | "output_file";

const OPTIONS: { key: OptionKey; short: string; long: string; help: string }[] = [
  { key: "predictions_file", short: "-p", long: "--predictions_file", help: "Path to the prediction file." },
  {
    key: "goldstandard_folder",
    short: "-g",
    long: "--goldstandard_folder",
    help: "Path to the folder containing the goldstandard file."
  },
  { key: "output_file", short: "-o", long: "--output_file", help: "Path to save the results JSON file." }
];

const argsSchema = z.object({
  predictions_file: z
    .string({ required_error: "Missing option '-p' / '--predictions_file'." })
    .min(1, "Option '--predictions_file' must not be empty."),
  goldstandard_folder: z
    .string({ required_error: "Missing option '-g' / '--goldstandard_folder'." })
    .min(1, "Option '--goldstandard_folder' must not be empty."),
  output_file: z.string().min(1, "Option '--output_file' must not be empty.").optional()
});

export type ParsedArgs = { help: true } | ({ help: false } & WorkflowOptions);

export function formatUsage(command: string, description: string): string {
  const rows = OPTIONS.map((o) => {
    const suffix =
      o.key === "output_file" ? `  [default: ${env.RESULTS_FILE}]` : "  [required]";
    return [`${o.short}, ${o.long} PATH`, `${o.help}${suffix}`];
  });
  rows.push(["-h, --help", "Show this message and exit."]);
  const width = Math.max(...rows.map(([flag]) => flag.length)) + 3;
  return [
    `Usage: ${command} [OPTIONS]`,
    "",
    `  ${description}`,
    "",
    "Options:",
    ...rows.map(([flag, help]) => `  ${flag.padEnd(width)}${help}`)
  ].join("\n");
}

export function parseArgs(argv: string[]): ParsedArgs {
  const raw: Partial<Record<OptionKey, string>> = {};

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === "--help" || arg === "-h") {
      return { help: true };
    }
    const eq = arg.startsWith("--") ? arg.indexOf("=") : -1;
    const name = eq === -1 ? arg : arg.slice(0, eq);
    const option = OPTIONS.find((o) => o.short === name || o.long === name);
    if (!option) {
      throw new UsageError(
        arg.startsWith("-") ? `No such option: ${name}` : `Got unexpected extra argument (${arg})`
      );
    }
    if (eq !== -1) {
      raw[option.key] = arg.slice(eq + 1);
    } else {
      const value = argv[i + 1];
      if (value === undefined) {
        throw new UsageError(`Option '${name}' requires an argument.`);
      }
      raw[option.key] = value;
      i++;
    }
  }

  const parsed = argsSchema.safeParse(raw);
  if (!parsed.success) {
    throw new UsageError(parsed.error.issues.map((i) => i.message).join(" "));
  }
  return {
    help: false,
    predictionsFile: parsed.data.predictions_file,
    goldstandardFolder: parsed.data.goldstandard_folder,
    outputFile: parsed.data.output_file ?? env.RESULTS_FILE
  };
}
