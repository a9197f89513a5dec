/**
 * Scoring function and the score workflow step, including how it reacts to
 * the results left behind by validation.
 */

import fs from "node:fs";
import { describe, expect, test, vi } from "vitest";
import { joinOnKey, runScoring, score, SCORING_MESSAGES } from "../src/services/scoring/score";
import { runValidation } from "../src/services/validation/validate";
import { makeSubmission, readJson } from "./helpers";

// Listed out of goldstandard order; the join must line them back up.
const SHUFFLED_PREDICTIONS = "id,probability\nd,0.1\nc,0.5\nb,0.7\na,0.9\n";

function silenceConsole() {
  return {
    log: vi.spyOn(console, "log").mockImplementation(() => {}),
    error: vi.spyOn(console, "error").mockImplementation(() => {})
  };
}

describe("joinOnKey", () => {
  test("follows goldstandard order, nulls missing IDs and repeats duplicates", () => {
    expect(joinOnKey(["a", "b", "c"], [1, 0, 1], ["c", "a", "a"], [0.3, 0.9, 0.8])).toEqual({
      labels: [1, 1, 0, 1],
      scores: [0.9, 0.8, null, 0.3]
    });
  });
});

describe("score", () => {
  test("reproduces hand-computed AUROC and AUPRC", () => {
    // Joined: labels [1, 0, 1, 0], scores [0.9, 0.7, 0.5, 0.1].
    // AUROC: 0.9 beats both negatives, 0.5 beats 0.1 -> 3/4.
    // AUPRC: recall 1->0.5 at precision 2/3..1/2, 0.5->0 at precision 1 -> 19/24.
    const { goldFile, predictionsFile } = makeSubmission({ predictions: SHUFFLED_PREDICTIONS });
    const scores = score(goldFile, predictionsFile);
    expect(Object.keys(scores)).toEqual(["auc_roc", "auprc"]);
    expect(scores.auc_roc).toBeCloseTo(0.75, 10);
    expect(scores.auprc).toBeCloseTo(19 / 24, 10);
  });

  test("perfect predictions score 1 on both metrics", () => {
    const { goldFile, predictionsFile } = makeSubmission({
      predictions: "id,probability\na,0.8\nb,0.2\nc,0.9\nd,0.1\n"
    });
    expect(score(goldFile, predictionsFile)).toEqual({ auc_roc: 1, auprc: 1 });
  });
});

describe("runScoring", () => {
  test("scores after a successful validation and appends the metrics", () => {
    const { log } = silenceConsole();
    const submission = makeSubmission({ predictions: SHUFFLED_PREDICTIONS });
    runValidation(submission);

    const record = runScoring(submission);

    expect(record.score_status).toBe("SCORED");
    expect(record.score_errors).toBe("");
    const written = readJson(submission.outputFile);
    expect(Object.keys(written)).toEqual([
      "validation_status",
      "validation_errors",
      "score_status",
      "score_errors",
      "auc_roc",
      "auprc"
    ]);
    expect(written).toEqual(record);
    expect(log).not.toHaveBeenCalled();
  });

  test("skips scoring when validation failed", () => {
    silenceConsole();
    const submission = makeSubmission();
    fs.writeFileSync(
      submission.outputFile,
      JSON.stringify({ validation_status: "INVALID", validation_errors: "Found 1 missing ID(s): ['d']" })
    );

    const record = runScoring(submission);

    expect(record).toEqual({
      validation_status: "INVALID",
      validation_errors: "Found 1 missing ID(s): ['d']",
      score_status: "INVALID",
      score_errors: SCORING_MESSAGES.SKIPPED
    });
    expect(readJson(submission.outputFile)).toEqual(record);
  });

  test("warns but still scores when validation results are missing", () => {
    const { log } = silenceConsole();
    const submission = makeSubmission();

    const record = runScoring(submission);

    expect(log).toHaveBeenCalledWith(SCORING_MESSAGES.MISSING_VALIDATION);
    expect(record.validation_status).toBe("");
    expect(record.score_status).toBe("SCORED");
    expect(record.auc_roc).toBe(0.75);
  });

  test("keeps unrelated keys from the existing results", () => {
    silenceConsole();
    const submission = makeSubmission();
    fs.writeFileSync(
      submission.outputFile,
      '{"validation_status":"VALIDATED","validation_errors":"","submission_id":"9"}'
    );
    expect(runScoring(submission).submission_id).toBe("9");
  });

  test("a malformed validation field does not hide an INVALID status", () => {
    const { log } = silenceConsole();
    const submission = makeSubmission();
    fs.writeFileSync(
      submission.outputFile,
      '{"validation_status":"INVALID","validation_errors":null,"submission_id":"9"}'
    );

    const record = runScoring(submission);

    expect(record).toEqual({
      validation_status: "INVALID",
      validation_errors: "",
      submission_id: "9",
      score_status: "INVALID",
      score_errors: SCORING_MESSAGES.SKIPPED
    });
    expect(log).not.toHaveBeenCalled();
  });

  test("reports INVALID when the metrics cannot be computed", () => {
    const { log } = silenceConsole();
    const submission = makeSubmission({ gold: "id,disease\na,0\nb,0\nc,0\nd,0\n" });
    runValidation(submission);

    const record = runScoring(submission);

    expect(record.score_status).toBe("INVALID");
    expect(record.score_errors).toBe(SCORING_MESSAGES.FAILED);
    expect(record.auc_roc).toBeUndefined();
    expect(log.mock.calls).toEqual([[
      "Error encountered: Only one class present in y_true. ROC AUC score is not defined in that case."
    ]]);
  });

  test("an unvalidated missing prediction surfaces as a NaN error", () => {
    const { log } = silenceConsole();
    const submission = makeSubmission({ predictions: "id,probability\na,0.9\nb,0.7\nc,0.5\n" });

    expect(runScoring(submission).score_status).toBe("INVALID");
    expect(log.mock.calls).toEqual([
      [SCORING_MESSAGES.MISSING_VALIDATION],
      ["Error encountered: Input contains NaN."]
    ]);
  });

  test("unreadable prediction columns are a scoring failure", () => {
    silenceConsole();
    const submission = makeSubmission({ predictions: "id,prob\na,0.9\n" });
    expect(runScoring(submission).score_errors).toBe(SCORING_MESSAGES.FAILED);
  });
});
