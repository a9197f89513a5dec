/**
 * Scoring function and the score step of the workflow.
 *
 * `score` must keep returning a flat map of metric name to value; the
 * orchestrator copies those keys straight into the results file.
 */

import { CHALLENGE_CONFIG, GOLDSTANDARD_COLUMNS, PREDICTION_COLUMNS } from "../../config/challenge";
import { extractGoldstandardFile } from "../../io/goldstandard";
import { readResults, writeResults, type ScoreRecord, type Scores, type ScoreStatus } from "../../io/results";
import { readTable, TableSchemaError } from "../../io/table";
import type { WorkflowOptions } from "../validation/validate";
import { auc, MetricError, precisionRecallCurve, rocAucScore } from "./metrics";

export const SCORING_MESSAGES = {
  MISSING_VALIDATION:
    "Validation results not found. Proceeding with scoring but results may be inaccurate.",
  SKIPPED: "Submission could not be evaluated due to validation errors.",
  FAILED: "Error encountered during scoring; submission not evaluated."
} as const;

/**
 * Left-joins predictions onto the goldstandard by ID so both arrays follow
 * goldstandard order. Gold IDs without a prediction get a null score; repeated
 * prediction IDs repeat the gold row.
 */
export function joinOnKey(
  goldIds: string[],
  labels: number[],
  predIds: string[],
  values: (number | null)[]
): { labels: number[]; scores: (number | null)[] } {
  const byId = new Map<string, (number | null)[]>();
  predIds.forEach((id, i) => {
    const existing = byId.get(id);
    if (existing) existing.push(values[i]);
    else byId.set(id, [values[i]]);
  });
  const joinedLabels: number[] = [];
  const joinedScores: (number | null)[] = [];
  goldIds.forEach((id, i) => {
    for (const value of byId.get(id) ?? [null]) {
      joinedLabels.push(labels[i]);
      joinedScores.push(value);
    }
  });
  return { labels: joinedLabels, scores: joinedScores };
}

/**
 * Metrics returned:
 *  - auc_roc: area under the ROC curve
 *  - auprc: area under the precision-recall curve
 */
export function score(goldFile: string, predFile: string): Scores {
  const { KEY_COLUMN, LABEL_COLUMN, PREDICTION_COLUMN } = CHALLENGE_CONFIG;
  const pred = readTable(predFile, PREDICTION_COLUMNS);
  const gold = readTable(goldFile, GOLDSTANDARD_COLUMNS);

  const { labels, scores } = joinOnKey(
    gold.strings(KEY_COLUMN),
    gold.ints(LABEL_COLUMN),
    pred.strings(KEY_COLUMN),
    pred.floats(PREDICTION_COLUMN)
  );
  const roc = rocAucScore(labels, scores);
  const { precision, recall } = precisionRecallCurve(labels, scores);
  return { auc_roc: roc, auprc: auc(recall, precision) };
}

export function runScoring(options: WorkflowOptions): ScoreRecord {
  const { predictionsFile, goldstandardFolder, outputFile } = options;
  const res = readResults(outputFile);

  // Without validation results, duplicated or missing predictions may skew scores.
  if (!res.validation_status) {
    console.log(SCORING_MESSAGES.MISSING_VALIDATION);
  }

  let scores: Scores = {};
  let status: ScoreStatus = "INVALID";
  let errors: string;
  if (res.validation_status === "INVALID") {
    errors = SCORING_MESSAGES.SKIPPED;
  } else {
    const goldFile = extractGoldstandardFile(goldstandardFolder);
    try {
      scores = score(goldFile, predictionsFile);
      status = "SCORED";
      errors = "";
    } catch (error) {
      if (!(error instanceof MetricError || error instanceof TableSchemaError)) throw error;
      errors = SCORING_MESSAGES.FAILED;
      console.log(`Error encountered: ${error.message}`);
    }
  }

  const record: ScoreRecord = Object.assign(
    { ...res, score_status: status, score_errors: errors },
    scores
  );
  writeResults(outputFile, record);
  return record;
}
