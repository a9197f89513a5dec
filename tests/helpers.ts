import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { z } from "zod";

const tempDirs: string[] = [];

export const GOLD_CSV = "id,disease\na,1\nb,0\nc,1\nd,0\n";
export const VALID_PREDICTIONS_CSV = "id,probability\na,0.9\nb,0.7\nc,0.5\nd,0.1\n";

export function makeTempDir(): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "pred-eval-"));
  tempDirs.push(dir);
  return dir;
}

export function cleanupTempDirs(): void {
  for (const dir of tempDirs.splice(0)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
}

export function writeFile(dir: string, name: string, content: string): string {
  const filePath = path.join(dir, name);
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, content, "utf8");
  return filePath;
}

/**
 * Lays out a submission the way the orchestrator mounts it: a goldstandard
 * folder with one file, a predictions file and a results path beside them.
 */
export function makeSubmission(options: {
  gold?: string;
  predictions?: string;
  predictionsName?: string;
} = {}): { dir: string; goldstandardFolder: string; goldFile: string; predictionsFile: string; outputFile: string } {
  const dir = makeTempDir();
  const goldFile = writeFile(dir, "goldstandard/gold.csv", options.gold ?? GOLD_CSV);
  const predictionsFile = writeFile(
    dir,
    options.predictionsName ?? "predictions.csv",
    options.predictions ?? VALID_PREDICTIONS_CSV
  );
  return {
    dir,
    goldstandardFolder: path.dirname(goldFile),
    goldFile,
    predictionsFile,
    outputFile: path.join(dir, "results.json")
  };
}

export function readJson(filePath: string): Record<string, unknown> {
  return z.record(z.unknown()).parse(JSON.parse(fs.readFileSync(filePath, "utf8")));
}
