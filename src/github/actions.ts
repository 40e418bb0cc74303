import type { Octokit } from "@octokit/rest";

import { TransportError } from "../errors.js";
import { formatGithubRepo, type GithubRepoRef } from "./repo.js";

export interface ActionsWorkflowRun {
  id: number;
  runNumber: number;
  event: string;
  status: string | null;
  conclusion: string | null;
  createdAt: string;
  htmlUrl: string;
  headBranch: string | null;
  checkSuiteId: number | null;
}

export interface ActionsJob {
  name: string;
  htmlUrl: string | null;
  startedAt: string;
  conclusion: string | null;
}

export interface ActionsArtifact {
  id: number;
  name: string;
}

/**
 * The slice of the GitHub Actions REST API the collectors need, bound to one
 * repository.
 */
export interface ActionsApi {
  readonly repoSlug: string;
  getWorkflowName(workflowFile: string): Promise<string>;
  /** Runs of one workflow, newest first, fetched page by page as consumed. */
  listWorkflowRuns(workflowFile: string): AsyncIterable<ActionsWorkflowRun>;
  listRunJobs(runId: number): Promise<ActionsJob[]>;
  listRunArtifacts(runId: number): Promise<ActionsArtifact[]>;
  downloadArtifact(artifactId: number): Promise<Uint8Array>;
}

const PAGE_SIZE = 100;

async function callApi<T>(operation: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    throw new TransportError(operation, { cause: error });
  }
}

export function createActionsApi(
  octokit: Octokit,
  ref: GithubRepoRef,
): ActionsApi {
  const repoSlug = formatGithubRepo(ref);

  return {
    repoSlug,

    async getWorkflowName(workflowFile) {
      const { data } = await callApi(
        `look up workflow ${workflowFile} in ${repoSlug}`,
        () =>
          octokit.rest.actions.getWorkflow({
            ...ref,
            workflow_id: workflowFile,
          }),
      );
      return data.name;
    },

    async *listWorkflowRuns(workflowFile) {
      const pages = octokit.paginate
        .iterator(octokit.rest.actions.listWorkflowRuns, {
          ...ref,
          workflow_id: workflowFile,
          per_page: PAGE_SIZE,
        })
        [Symbol.asyncIterator]();

      while (true) {
        const page = await callApi(
          `list runs of ${workflowFile} in ${repoSlug}`,
          () => pages.next(),
        );
        if (page.done) {
          return;
        }

        for (const run of page.value.data) {
          yield {
            id: run.id,
            runNumber: run.run_number,
            event: run.event,
            status: run.status,
            conclusion: run.conclusion,
            createdAt: run.created_at,
            htmlUrl: run.html_url,
            headBranch: run.head_branch,
            checkSuiteId: run.check_suite_id ?? null,
          };
        }
      }
    },

    async listRunJobs(runId) {
      const jobs = await callApi(
        `list jobs of run ${runId} in ${repoSlug}`,
        () =>
          octokit.paginate(octokit.rest.actions.listJobsForWorkflowRun, {
            ...ref,
            run_id: runId,
            per_page: PAGE_SIZE,
          }),
      );
      return jobs.map((job) => ({
        name: job.name,
        htmlUrl: job.html_url,
        startedAt: job.started_at,
        conclusion: job.conclusion,
      }));
    },

    async listRunArtifacts(runId) {
      const artifacts = await callApi(
        `list artifacts of run ${runId} in ${repoSlug}`,
        () =>
          octokit.paginate(octokit.rest.actions.listWorkflowRunArtifacts, {
            ...ref,
            run_id: runId,
            per_page: PAGE_SIZE,
          }),
      );
      return artifacts.map((artifact) => ({
        id: artifact.id,
        name: artifact.name,
      }));
    },

    async downloadArtifact(artifactId) {
      const operation = `download artifact ${artifactId} from ${repoSlug}`;
      const response = await callApi(operation, () =>
        octokit.rest.actions.downloadArtifact({
          ...ref,
          artifact_id: artifactId,
          archive_format: "zip",
        }),
      );
      const data: unknown = response.data;
      if (!(data instanceof ArrayBuffer)) {
        throw new TransportError(operation, {
          cause: new Error("Artifact download did not return binary content"),
        });
      }

      return new Uint8Array(data);
    },
  };
}
