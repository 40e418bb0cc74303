import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";

import { createAppveyorApi } from "../../appveyor/client.js";
import { runCollectors, type CollectorContext } from "../../collectors/index.js";
import { loadClientIds, loadStatusConfig } from "../../config/loader.js";
import type { StatusConfig } from "../../config/schema.js";
import { createActionsApi } from "../../github/actions.js";
import { createGithubClient } from "../../github/client.js";
import { parseGithubRepoSpec } from "../../github/repo.js";
import {
  renderHtmlReport,
  type RenderedReport,
} from "../../reporter/html-report.js";
import { buildReport, summarizeReport } from "../../status/aggregate.js";
import { computeCutoff } from "../../status/time.js";
import type { DailyReport } from "../../types/status.js";

export interface ReportCommandOptions {
  outputPath: string;
  configPath?: string;
  now?: Date;
}

function createCollectorContext(
  config: StatusConfig,
  cutoff: Date,
): CollectorContext {
  const octokit = createGithubClient();

  return {
    cutoff,
    workflows: {
      api: createActionsApi(octokit, parseGithubRepoSpec(config.workflowRepo)),
      files: config.workflows,
    },
    clients: {
      api: createActionsApi(octokit, parseGithubRepoSpec(config.clients.repo)),
      workflowFile: config.clients.workflow,
      resultSuffix: config.clients.resultSuffix,
    },
    appveyor: createAppveyorApi({
      project: config.appveyor.project,
      baseUrl: config.appveyor.baseUrl,
      pageSize: config.appveyor.pageSize,
    }),
  };
}

export async function generateDailyReport(
  config: StatusConfig,
  context: CollectorContext,
  knownClients: Iterable<string>,
): Promise<DailyReport> {
  const results = await runCollectors(context);

  return buildReport({
    repo: config.workflowRepo,
    expectedWorkflows: config.workflows,
    knownClients,
    ...results,
  });
}

function writeSummaryLines(report: DailyReport): void {
  const summary = summarizeReport(report);
  process.stderr.write(
    `  github-actions: ${report.workflowRuns.length} runs\n`,
  );
  process.stderr.write(
    `  local-clients: ${report.clientResults.length} results from ${report.knownClients.size} known clients\n`,
  );
  process.stderr.write(
    `  appveyor: ${report.thirdPartyBuilds.length} builds\n`,
  );
  if (summary.absentCount > 0) {
    const absent = [...summary.absentWorkflows, ...summary.absentClients];
    process.stderr.write(`  absent: ${absent.join(", ")}\n`);
  }
}

async function writeReportBody(
  outputPath: string,
  rendered: RenderedReport,
): Promise<void> {
  const absolutePath = path.resolve(process.cwd(), outputPath);
  await mkdir(path.dirname(absolutePath), { recursive: true });
  await writeFile(absolutePath, `${rendered.body}\n`, "utf8");
}

export async function runReportCommand(
  options: ReportCommandOptions,
): Promise<void> {
  const config = await loadStatusConfig(options.configPath);
  const knownClients = await loadClientIds(config.clients.file);
  const cutoff = computeCutoff(options.now ?? new Date(), config.lookbackHours);

  process.stderr.write(
    `Collecting CI activity since ${cutoff.toISOString()}...\n`,
  );
  const report = await generateDailyReport(
    config,
    createCollectorContext(config, cutoff),
    knownClients,
  );
  writeSummaryLines(report);

  const rendered = renderHtmlReport(report);
  await writeReportBody(options.outputPath, rendered);
  process.stdout.write(`${rendered.subject}\n`);
}
