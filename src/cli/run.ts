import type { WorkflowOptions } from "../services/validation/validate";
import { CliError, UsageError } from "../utils/cliError";
import { formatUsage, parseArgs } from "./args";

export interface Command {
  name: string;
  description: string;
  /** Runs the workflow step and returns the status line for stdout. */
  run(options: WorkflowOptions): string;
}

export function handleCliError(command: Command, error: unknown): number {
  if (error instanceof UsageError) {
    console.error(`Error: ${error.message}\n\n${formatUsage(command.name, command.description)}`);
    return error.exitCode;
  }

  if (error instanceof CliError) {
    console.error(error.message);
    return error.exitCode;
  }

  console.error(`${command.name} failed:`, error);
  return 1;
}

/** Returns the process exit code; both VALIDATED/SCORED and INVALID exit 0. */
export function runCli(command: Command, argv: string[]): number {
  try {
    const args = parseArgs(argv);
    if (args.help) {
      console.log(formatUsage(command.name, command.description));
      return 0;
    }
    const { predictionsFile, goldstandardFolder, outputFile } = args;
    console.log(command.run({ predictionsFile, goldstandardFolder, outputFile }));
    return 0;
  } catch (error) {
    return handleCliError(command, error);
  }
}
