import { runScoring } from "../services/scoring/score";
import { runValidation } from "../services/validation/validate";
import type { Command } from "./run";

export const validateCommand: Command = {
  name: "validate-predictions",
  description: "Validates the predictions file in preparation for evaluation.",
  run: (options) => runValidation(options).validation_status
};

export const scoreCommand: Command = {
  name: "score-predictions",
  description:
    "Scores predictions against the goldstandard and updates the results JSON file with scoring status and metrics.",
  run: (options) => runScoring(options).score_status
};
