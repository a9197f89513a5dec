/**
 * Challenge-specific settings. Organisers customise this file (and the
 * validate/score functions) for their own goldstandard and prediction format.
 */

export type ColumnType = "string" | "int" | "float";

export type ColumnSpec = Record<string, ColumnType>;

/** Goldstandard columns and data types. */
export const GOLDSTANDARD_COLUMNS = {
  id: "string",
  disease: "int"
} as const satisfies ColumnSpec;

/** Expected columns and data types for the predictions file. */
export const PREDICTION_COLUMNS = {
  id: "string",
  probability: "float"
} as const satisfies ColumnSpec;

export const CHALLENGE_CONFIG = {
  /** Column joining predictions to the goldstandard. */
  KEY_COLUMN: "id",
  /** Binary ground-truth label (0/1) in the goldstandard. */
  LABEL_COLUMN: "disease",
  /** Predicted probability of the positive class. */
  PREDICTION_COLUMN: "probability",
  /** Inclusive range for prediction values. */
  PREDICTION_MIN: 0,
  PREDICTION_MAX: 1
} as const;
