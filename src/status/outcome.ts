import { UnrecognizedStatusError } from "../errors.js";
import type { Outcome } from "../types/status.js";

const WORKFLOW_CONCLUSIONS = new Map<string, Outcome>([
  ["success", "pass"],
  ["failure", "fail"],
  ["timed_out", "error"],
  ["neutral", "incomplete"],
  ["action_required", "incomplete"],
  ["cancelled", "incomplete"],
  ["skipped", "incomplete"],
  ["stale", "incomplete"],
]);

const BUILD_STATUSES = new Map<string, Outcome>([
  ["success", "pass"],
  ["failed", "fail"],
  ["cancelled", "incomplete"],
]);

export function classifyWorkflowConclusion(
  conclusion: string | null,
): Outcome {
  const outcome =
    conclusion === null ? undefined : WORKFLOW_CONCLUSIONS.get(conclusion);
  if (!outcome) {
    throw new UnrecognizedStatusError("github-actions", conclusion);
  }

  return outcome;
}

export function classifyBuildStatus(status: string): Outcome {
  const outcome = BUILD_STATUSES.get(status);
  if (!outcome) {
    throw new UnrecognizedStatusError("appveyor", status);
  }

  return outcome;
}

export function classifyReturnCode(code: number): Outcome {
  return code === 0 ? "pass" : "fail";
}
