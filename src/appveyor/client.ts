import { z } from "zod";

import { ContractViolationError, TransportError } from "../errors.js";

const historyBuildSchema = z.object({
  buildId: z.number().int(),
  version: z.string(),
  status: z.string(),
  started: z.string().nullish(),
  finished: z.string().nullish(),
});

const historySchema = z.object({
  builds: z.array(historyBuildSchema).nullish(),
});

const buildDetailSchema = z.object({
  build: z.object({
    jobs: z.array(
      z.object({
        jobId: z.string(),
        name: z.string(),
        status: z.string(),
      }),
    ),
  }),
});

export type AppveyorHistoryBuild = z.infer<typeof historyBuildSchema>;
export type AppveyorJob = z.infer<
  typeof buildDetailSchema
>["build"]["jobs"][number];

export interface AppveyorApi {
  readonly project: string;
  /** Build history, newest first, following the `startBuildId` cursor. */
  listBuilds(): AsyncIterable<AppveyorHistoryBuild>;
  getBuildJobs(version: string): Promise<AppveyorJob[]>;
  buildUrl(buildId: number): string;
  jobUrl(buildId: number, jobId: string): string;
}

export interface AppveyorClientOptions {
  project: string;
  baseUrl?: string;
  pageSize?: number;
  fetch?: typeof fetch;
}

const DEFAULT_BASE_URL = "https://ci.appveyor.com";
const DEFAULT_PAGE_SIZE = 20;

export function createAppveyorApi(options: AppveyorClientOptions): AppveyorApi {
  const baseUrl = (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, "");
  const pageSize = options.pageSize ?? DEFAULT_PAGE_SIZE;
  const fetchImpl = options.fetch ?? fetch;
  const project = options.project;

  async function getJson<T>(
    operation: string,
    url: URL,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  ): Promise<T> {
    let response: Response;
    let payload: unknown;
    try {
      response = await fetchImpl(url, {
        headers: { Accept: "application/json" },
      });
      if (!response.ok) {
        throw new Error(`${response.status} ${response.statusText}`.trim());
      }
      payload = await response.json();
    } catch (error) {
      throw new TransportError(operation, { cause: error });
    }

    const parsed = schema.safeParse(payload);
    if (!parsed.success) {
      const fields = parsed.error.issues
        .map((issue) => issue.path.join(".") || "(root)")
        .join(", ");
      throw new ContractViolationError(
        `Unexpected AppVeyor response while trying to ${operation} (fields: ${fields})`,
        { cause: parsed.error },
      );
    }

    return parsed.data;
  }

  return {
    project,

    async *listBuilds() {
      let startBuildId: number | undefined;
      while (true) {
        const url = new URL(`${baseUrl}/api/projects/${project}/history`);
        url.searchParams.set("recordsNumber", String(pageSize));
        if (startBuildId !== undefined) {
          url.searchParams.set("startBuildId", String(startBuildId));
        }

        const page = await getJson(
          `list build history of ${project}`,
          url,
          historySchema,
        );
        const builds = page.builds ?? [];
        const last = builds.at(-1);
        if (!last) {
          return;
        }

        yield* builds;
        startBuildId = last.buildId;
      }
    },

    async getBuildJobs(version) {
      const url = new URL(
        `${baseUrl}/api/projects/${project}/build/${encodeURIComponent(version)}`,
      );
      const detail = await getJson(
        `fetch build ${version} of ${project}`,
        url,
        buildDetailSchema,
      );
      return detail.build.jobs;
    },

    buildUrl(buildId) {
      return `${baseUrl}/project/${project}/builds/${buildId}`;
    },

    jobUrl(buildId, jobId) {
      return `${baseUrl}/project/${project}/builds/${buildId}/job/${jobId}`;
    },
  };
}
