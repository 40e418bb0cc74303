import type { ActionsApi, ActionsJob } from "../github/actions.js";
import { classifyWorkflowConclusion } from "../status/outcome.js";
import { isWithinWindow, parseTimestamp } from "../status/time.js";
import type { JobRecord, WorkflowRun } from "../types/status.js";

const REPORTED_EVENTS = new Set(["schedule", "workflow_dispatch"]);

function toJobRecord(job: ActionsJob, fallbackUrl: string): JobRecord {
  return {
    name: job.name,
    url: job.htmlUrl ?? fallbackUrl,
    timestamp: parseTimestamp(job.startedAt),
    outcome: classifyWorkflowConclusion(job.conclusion),
  };
}

export async function collectWorkflowRuns(
  api: ActionsApi,
  workflowFiles: readonly string[],
  cutoff: Date,
): Promise<WorkflowRun[]> {
  const runs: WorkflowRun[] = [];

  for (const file of workflowFiles) {
    const name = await api.getWorkflowName(file);

    for await (const run of api.listWorkflowRuns(file)) {
      if (run.status !== "completed" || !REPORTED_EVENTS.has(run.event)) {
        continue;
      }

      // Runs arrive newest first, so the first one outside the window ends
      // the scan for this workflow.
      const timestamp = parseTimestamp(run.createdAt);
      if (!isWithinWindow(timestamp, cutoff)) {
        break;
      }

      const jobs = await api.listRunJobs(run.id);
      runs.push({
        file,
        name,
        runNumber: run.runNumber,
        url: run.htmlUrl,
        timestamp,
        outcome: classifyWorkflowConclusion(run.conclusion),
        jobs: jobs.map((job) => toJobRecord(job, run.htmlUrl)),
      });
    }
  }

  return runs;
}
