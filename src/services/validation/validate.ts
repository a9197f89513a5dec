/**
 * Predictions-file validation and the validate step of the workflow.
 *
 * Customise `validate` per challenge; `runValidation` is the glue the
 * orchestrator depends on and should rarely need changes.
 */

import fs from "node:fs";
import { CHALLENGE_CONFIG, GOLDSTANDARD_COLUMNS, PREDICTION_COLUMNS } from "../../config/challenge";
import { env } from "../../config/env";
import { extractGoldstandardFile } from "../../io/goldstandard";
import { writeResults, type ValidationRecord } from "../../io/results";
import { readTable, TableSchemaError, type Table } from "../../io/table";
import {
  checkDuplicateKeys,
  checkMissingKeys,
  checkNullValues,
  checkUnknownKeys,
  checkValuesRange
} from "./checks";

export interface WorkflowOptions {
  predictionsFile: string;
  goldstandardFolder: string;
  outputFile: string;
}

function describeColumns(): string {
  return Object.entries(PREDICTION_COLUMNS)
    .map(([name, type]) => `${name} (${type})`)
    .join(", ");
}

/**
 * Checks include:
 *  - prediction file has the expected columns and data types
 *  - exactly one prediction per ID
 *  - every goldstandard ID has a prediction
 *  - no predictions for IDs absent from the goldstandard
 *  - prediction values are not null
 *  - prediction values are within [0, 1]
 *
 * Returns error messages; an empty list means the file is valid.
 */
export function validate(goldFile: string, predFile: string): string[] {
  const { KEY_COLUMN, PREDICTION_COLUMN, PREDICTION_MIN, PREDICTION_MAX } = CHALLENGE_CONFIG;
  const gold = readTable(goldFile, GOLDSTANDARD_COLUMNS);

  let pred: Table;
  try {
    pred = readTable(predFile, PREDICTION_COLUMNS);
  } catch (error) {
    if (error instanceof TableSchemaError) {
      return [
        `Invalid column names and/or types: ${error.message}. Expecting: ${describeColumns()}.`
      ];
    }
    throw error;
  }

  const goldIds = gold.strings(KEY_COLUMN);
  const predIds = pred.strings(KEY_COLUMN);
  const values = pred.floats(PREDICTION_COLUMN);
  const errors = [
    checkDuplicateKeys(predIds),
    checkMissingKeys(goldIds, predIds),
    checkUnknownKeys(goldIds, predIds),
    checkNullValues(values, PREDICTION_COLUMN),
    checkValuesRange(values, PREDICTION_COLUMN, PREDICTION_MIN, PREDICTION_MAX)
  ];
  return errors.filter((e) => e !== "");
}

export function truncateErrors(text: string, maxLength: number = env.VALIDATION_ERRORS_MAX_LENGTH): string {
  if (text.length <= maxLength) return text;
  let cut = maxLength - 4;
  // Never split a surrogate pair.
  const last = text.charCodeAt(cut - 1);
  if (last >= 0xd800 && last <= 0xdbff) cut--;
  return text.slice(0, cut) + "...";
}

export function runValidation(options: WorkflowOptions): ValidationRecord {
  const { predictionsFile, goldstandardFolder, outputFile } = options;

  let errors: string[];
  if (predictionsFile.includes("INVALID")) {
    // Upstream steps hand over a file describing why the submission was rejected.
    errors = [fs.readFileSync(predictionsFile, "utf8")];
  } else {
    const goldFile = extractGoldstandardFile(goldstandardFolder);
    errors = validate(goldFile, predictionsFile);
  }

  const invalidReasons = errors.join("\n");
  const record: ValidationRecord = {
    validation_status: invalidReasons ? "INVALID" : "VALIDATED",
    validation_errors: truncateErrors(invalidReasons)
  };
  writeResults(outputFile, record);
  return record;
}
