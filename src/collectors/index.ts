import type { AppveyorApi } from "../appveyor/client.js";
import type { ActionsApi } from "../github/actions.js";
import type {
  ClientResult,
  ThirdPartyBuild,
  WorkflowRun,
} from "../types/status.js";
import { collectAppveyorBuilds } from "./collect-appveyor.js";
import {
  collectClientResults,
  type ClientCollectorOptions,
} from "./collect-clients.js";
import { collectWorkflowRuns } from "./collect-workflows.js";

export interface CollectorContext {
  cutoff: Date;
  workflows: {
    api: ActionsApi;
    files: readonly string[];
  };
  clients: ClientCollectorOptions & {
    api: ActionsApi;
  };
  appveyor: AppveyorApi;
}

export interface CollectorResults {
  workflowRuns: WorkflowRun[];
  clientResults: ClientResult[];
  thirdPartyBuilds: ThirdPartyBuild[];
}

export async function runCollectors(
  context: CollectorContext,
): Promise<CollectorResults> {
  const { api: clientsApi, ...clientOptions } = context.clients;
  const [workflowRuns, clientResults, thirdPartyBuilds] = await Promise.all([
    collectWorkflowRuns(
      context.workflows.api,
      context.workflows.files,
      context.cutoff,
    ),
    collectClientResults(clientsApi, clientOptions, context.cutoff),
    collectAppveyorBuilds(context.appveyor, context.cutoff),
  ]);

  return {
    workflowRuns,
    clientResults,
    thirdPartyBuilds,
  };
}
