import { ContractViolationError } from "../errors.js";
import type { ActionsApi, ActionsWorkflowRun } from "../github/actions.js";
import { classifyWorkflowConclusion } from "../status/outcome.js";
import { isWithinWindow, parseTimestamp } from "../status/time.js";
import type { ClientResult, ClientRun } from "../types/status.js";
import { readTestOutcomes } from "./artifact.js";

export interface ClientCollectorOptions {
  /** File name of the workflow that processes uploaded client results. */
  workflowFile: string;
  resultSuffix?: string;
  scratchRoot?: string;
}

export interface ResultBranch {
  clientId: string;
  buildNumber: number;
}

const RESULT_BRANCH = /^result-(.+)-(\d+)$/;

export function parseResultBranch(branch: string | null): ResultBranch {
  const match = branch?.match(RESULT_BRANCH);
  if (!match?.[1] || !match[2]) {
    throw new ContractViolationError(
      `Result run branch ${JSON.stringify(branch)} does not match result-<client>-<build>`,
    );
  }

  return {
    clientId: match[1],
    buildNumber: Number.parseInt(match[2], 10),
  };
}

export function artifactPageUrl(
  repoSlug: string,
  checkSuiteId: number,
  artifactId: number,
): string {
  return `https://github.com/${repoSlug}/suites/${checkSuiteId}/artifacts/${artifactId}`;
}

async function collectClientRun(
  api: ActionsApi,
  run: ActionsWorkflowRun,
  branch: ResultBranch,
  timestamp: Date,
  options: ClientCollectorOptions,
): Promise<ClientRun> {
  const artifacts = await api.listRunArtifacts(run.id);
  const [artifact] = artifacts;
  if (!artifact || artifacts.length !== 1) {
    throw new ContractViolationError(
      `Expected exactly one artifact on result run ${run.htmlUrl}, found ${artifacts.length}`,
    );
  }
  if (run.checkSuiteId === null) {
    throw new ContractViolationError(
      `Result run ${run.htmlUrl} has no check suite id`,
    );
  }

  const archive = await api.downloadArtifact(artifact.id);
  const tests = await readTestOutcomes(archive, {
    resultSuffix: options.resultSuffix,
    scratchRoot: options.scratchRoot,
  });

  return {
    kind: "run",
    ...branch,
    timestamp,
    artifactUrl: artifactPageUrl(api.repoSlug, run.checkSuiteId, artifact.id),
    tests,
  };
}

export async function collectClientResults(
  api: ActionsApi,
  options: ClientCollectorOptions,
  cutoff: Date,
): Promise<ClientResult[]> {
  const results: ClientResult[] = [];

  for await (const run of api.listWorkflowRuns(options.workflowFile)) {
    if (run.status !== "completed") {
      continue;
    }

    // Same newest-first assumption as the hosted workflows.
    const timestamp = parseTimestamp(run.createdAt);
    if (!isWithinWindow(timestamp, cutoff)) {
      break;
    }

    const branch = parseResultBranch(run.headBranch);
    if (classifyWorkflowConclusion(run.conclusion) === "pass") {
      results.push(
        await collectClientRun(api, run, branch, timestamp, options),
      );
    } else {
      results.push({
        kind: "error",
        ...branch,
        timestamp,
        url: run.htmlUrl,
      });
    }
  }

  return results;
}
