import fs from "node:fs";
import path from "node:path";
import { CliError } from "../utils/cliError";

function listEntries(folder: string): string[] {
  try {
    return fs.readdirSync(folder);
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") return [];
    throw error;
  }
}

/**
 * The orchestrator mounts the goldstandard as a folder holding a single file.
 * Hidden entries (dotfiles) are not counted; a missing folder holds none.
 */
export function extractGoldstandardFile(folder: string): string {
  const files = listEntries(folder)
    .filter((name) => !name.startsWith("."))
    .sort();
  if (files.length !== 1) {
    throw new CliError(
      1,
      `Expected exactly one goldstandard file in folder. Got ${files.length}. Exiting.`
    );
  }
  return path.join(folder, files[0]);
}
