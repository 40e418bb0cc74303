export type Outcome = "pass" | "fail" | "error" | "incomplete";

/** Counts per outcome, keyed in the order each outcome was first seen. */
export type OutcomeTally = ReadonlyMap<Outcome, number>;

export interface JobRecord {
  name: string;
  url: string;
  timestamp: Date;
  outcome: Outcome;
}

export interface WorkflowRun {
  /** Workflow file the run belongs to, e.g. `build-ubuntu.yaml`. */
  file: string;
  name: string;
  runNumber: number;
  url: string;
  timestamp: Date;
  /** Run-level conclusion. Tallies only count the jobs. */
  outcome: Outcome;
  jobs: readonly JobRecord[];
}

export interface ClientRun {
  kind: "run";
  clientId: string;
  buildNumber: number;
  timestamp: Date;
  artifactUrl: string;
  tests: ReadonlyMap<string, Outcome>;
}

/**
 * A client submission whose result-processing workflow did not succeed, so no
 * per-test outcomes are available.
 */
export interface ClientError {
  kind: "error";
  clientId: string;
  buildNumber: number;
  timestamp: Date;
  url: string;
}

export type ClientResult = ClientRun | ClientError;

export interface ThirdPartyJob {
  buildId: number;
  jobId: string;
  name: string;
  url: string;
  outcome: Outcome;
}

export interface ThirdPartyBuild {
  id: number;
  version: string;
  url: string;
  timestamp: Date;
  outcome: Outcome;
  jobs: readonly ThirdPartyJob[];
}

export interface DailyReport {
  repo: string;
  expectedWorkflows: readonly string[];
  workflowRuns: readonly WorkflowRun[];
  clientResults: readonly ClientResult[];
  knownClients: ReadonlySet<string>;
  thirdPartyBuilds: readonly ThirdPartyBuild[];
}

export interface ReportSummary {
  tally: OutcomeTally;
  total: number;
  absentWorkflows: string[];
  absentClients: string[];
  absentCount: number;
}
