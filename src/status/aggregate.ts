import type {
  ClientResult,
  DailyReport,
  Outcome,
  OutcomeTally,
  ReportSummary,
  ThirdPartyBuild,
  WorkflowRun,
} from "../types/status.js";

export const SUBJECT_LABELS: Record<Outcome, string> = {
  pass: "PASSED",
  fail: "FAILED",
  error: "ERRORED",
  incomplete: "INCOMPLETE",
};

export interface BuildReportInput {
  repo: string;
  expectedWorkflows: readonly string[];
  workflowRuns: readonly WorkflowRun[];
  clientResults: readonly ClientResult[];
  knownClients: Iterable<string>;
  thirdPartyBuilds: readonly ThirdPartyBuild[];
}

function freezeClientResult(result: ClientResult): ClientResult {
  if (result.kind === "error") {
    return Object.freeze({ ...result });
  }
  return Object.freeze({ ...result, tests: new Map(result.tests) });
}

/**
 * Copies every collection the report holds, so later changes to the
 * collector output cannot alter it. Maps and sets are exposed through their
 * read-only interfaces.
 */
export function buildReport(input: BuildReportInput): DailyReport {
  return Object.freeze({
    repo: input.repo,
    expectedWorkflows: Object.freeze([...input.expectedWorkflows]),
    workflowRuns: Object.freeze(
      input.workflowRuns.map((run) =>
        Object.freeze({
          ...run,
          jobs: Object.freeze(run.jobs.map((job) => Object.freeze({ ...job }))),
        }),
      ),
    ),
    clientResults: Object.freeze(input.clientResults.map(freezeClientResult)),
    knownClients: new Set(input.knownClients),
    thirdPartyBuilds: Object.freeze(
      input.thirdPartyBuilds.map((build) =>
        Object.freeze({
          ...build,
          jobs: Object.freeze(
            build.jobs.map((job) => Object.freeze({ ...job })),
          ),
        }),
      ),
    ),
  });
}

/** Outcomes contributed by one client result; a processing error counts once. */
export function clientResultOutcomes(result: ClientResult): Outcome[] {
  return result.kind === "run" ? [...result.tests.values()] : ["error"];
}

/**
 * Counts outcomes across GitHub jobs, client tests and AppVeyor jobs, in that
 * order. Only outcomes that occur appear in the result.
 */
export function tallyOutcomes(report: DailyReport): OutcomeTally {
  const tally = new Map<Outcome, number>();
  const outcomes: Outcome[] = [
    ...report.workflowRuns.flatMap((run) => run.jobs.map((job) => job.outcome)),
    ...report.clientResults.flatMap(clientResultOutcomes),
    ...report.thirdPartyBuilds.flatMap((build) =>
      build.jobs.map((job) => job.outcome),
    ),
  ];

  for (const outcome of outcomes) {
    tally.set(outcome, (tally.get(outcome) ?? 0) + 1);
  }

  return tally;
}

export function findAbsentSources(report: DailyReport): {
  absentWorkflows: string[];
  absentClients: string[];
} {
  const seenWorkflows = new Set(report.workflowRuns.map((run) => run.file));
  const seenClients = new Set(
    report.clientResults.map((result) => result.clientId),
  );

  return {
    absentWorkflows: [...new Set(report.expectedWorkflows)]
      .filter((file) => !seenWorkflows.has(file))
      .sort((left, right) => left.localeCompare(right)),
    absentClients: [...report.knownClients]
      .filter((clientId) => !seenClients.has(clientId))
      .sort((left, right) => left.localeCompare(right)),
  };
}

export function summarizeReport(report: DailyReport): ReportSummary {
  const tally = tallyOutcomes(report);
  const total = [...tally.values()].reduce((sum, count) => sum + count, 0);
  const { absentWorkflows, absentClients } = findAbsentSources(report);

  return {
    tally,
    total,
    absentWorkflows,
    absentClients,
    absentCount: absentWorkflows.length + absentClients.length,
  };
}

export function formatSubject(repo: string, summary: ReportSummary): string {
  const prefix = `${repo} daily summary: `;
  if (summary.total === 0) {
    return `${prefix}NOTHING`;
  }

  const parts = [...summary.tally].map(
    ([outcome, count]) => `${count} ${SUBJECT_LABELS[outcome]}`,
  );
  if (summary.absentCount > 0) {
    parts.push(`${summary.absentCount} ABSENT`);
  }

  return `${prefix}${parts.join(", ")}`;
}
