import { formatSubject, summarizeReport } from "../status/aggregate.js";
import { formatTimestamp } from "../status/time.js";
import type {
  ClientResult,
  DailyReport,
  ThirdPartyBuild,
  WorkflowRun,
} from "../types/status.js";
import { escapeHtml, link, outcomeBadge, renderPage } from "./render.js";

export interface RenderedReport {
  subject: string;
  body: string;
}

function renderNestedList(heading: string, items: string[]): string {
  return [`<p>${heading}</p>`, "<ul>", ...items, "</ul>"].join("\n");
}

function renderSection(
  title: string,
  items: string[],
  placeholder: string,
): string {
  const entries = items.length > 0 ? items : [`<li>${placeholder}</li>`];
  return ["<li>", renderNestedList(`${escapeHtml(title)}:`, entries), "</li>"].join(
    "\n",
  );
}

function renderWorkflowRun(run: WorkflowRun): string {
  const heading = `${outcomeBadge(run.outcome)} ${link(run.url, `${run.name} #${run.runNumber}`)} ${formatTimestamp(run.timestamp)}`;
  const jobs = run.jobs.map(
    (job) =>
      `<li>${outcomeBadge(job.outcome)} ${link(job.url, job.name)} ${formatTimestamp(job.timestamp)}</li>`,
  );
  return `<li>${renderNestedList(heading, jobs)}</li>`;
}

function renderClientResult(result: ClientResult, anchored: boolean): string {
  const idAttr = anchored ? ` id="${escapeHtml(result.clientId)}"` : "";
  const label = `${escapeHtml(result.clientId)} #${result.buildNumber}`;
  const timestamp = formatTimestamp(result.timestamp);

  if (result.kind === "error") {
    return `<li${idAttr}>${outcomeBadge("error")} processing results for ${label} [${link(result.url, "logs")}] ${timestamp}</li>`;
  }

  const heading = `${label} [${link(result.artifactUrl, "download logs")}] ${timestamp}`;
  const tests = [...result.tests].map(
    ([testName, outcome]) =>
      `<li>${outcomeBadge(outcome)} ${escapeHtml(testName)}</li>`,
  );
  return `<li${idAttr}>${renderNestedList(heading, tests)}</li>`;
}

function renderClientResults(results: readonly ClientResult[]): string[] {
  // Only the first entry per client gets the anchor so ids stay unique.
  const anchored = new Set<string>();
  return results.map((result) => {
    const isFirst = !anchored.has(result.clientId);
    anchored.add(result.clientId);
    return renderClientResult(result, isFirst);
  });
}

function renderThirdPartyBuild(build: ThirdPartyBuild): string {
  const heading = `${outcomeBadge(build.outcome)} ${link(build.url, build.version)} ${formatTimestamp(build.timestamp)}`;
  const jobs = build.jobs.map(
    (job) => `<li>${outcomeBadge(job.outcome)} ${link(job.url, job.name)}</li>`,
  );
  return `<li>${renderNestedList(heading, jobs)}</li>`;
}

export function renderHtmlReport(report: DailyReport): RenderedReport {
  const subject = formatSubject(report.repo, summarizeReport(report));
  const sections = [
    renderSection(
      "GitHub Actions",
      report.workflowRuns.map(renderWorkflowRun),
      "[no runs]",
    ),
    renderSection(
      "Local Clients",
      renderClientResults(report.clientResults),
      "[no runs]",
    ),
    renderSection(
      "AppVeyor Builds",
      report.thirdPartyBuilds.map(renderThirdPartyBuild),
      "[no builds]",
    ),
  ];

  return {
    subject,
    body: renderPage(subject, ["<ul>", ...sections, "</ul>"].join("\n")),
  };
}
