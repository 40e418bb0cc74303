import type { AppveyorApi } from "../appveyor/client.js";
import { classifyBuildStatus } from "../status/outcome.js";
import { isWithinWindow, parseTimestamp } from "../status/time.js";
import type { ThirdPartyBuild } from "../types/status.js";

export async function collectAppveyorBuilds(
  api: AppveyorApi,
  cutoff: Date,
): Promise<ThirdPartyBuild[]> {
  const builds: ThirdPartyBuild[] = [];

  for await (const build of api.listBuilds()) {
    if (!build.finished) {
      continue;
    }

    // History is ordered newest first; everything past this point is older.
    const finished = parseTimestamp(build.finished);
    if (!isWithinWindow(finished, cutoff)) {
      break;
    }

    const jobs = await api.getBuildJobs(build.version);
    builds.push({
      id: build.buildId,
      version: build.version,
      url: api.buildUrl(build.buildId),
      timestamp: parseTimestamp(build.started ?? build.finished),
      outcome: classifyBuildStatus(build.status),
      jobs: jobs.map((job) => ({
        buildId: build.buildId,
        jobId: job.jobId,
        name: job.name,
        url: api.jobUrl(build.buildId, job.jobId),
        outcome: classifyBuildStatus(job.status),
      })),
    });
  }

  return builds;
}
