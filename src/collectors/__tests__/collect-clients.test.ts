import { mkdtemp, readdir, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import {
  CUTOFF,
  FakeActionsApi,
  hoursBeforeNow,
  makeRun,
  makeZip,
} from "../../__tests__/helpers/fakes.js";
import { ContractViolationError } from "../../errors.js";
import { readTestOutcomes } from "../artifact.js";
import {
  collectClientResults,
  parseResultBranch,
  type ClientCollectorOptions,
} from "../collect-clients.js";

let scratchRoot: string;
let options: ClientCollectorOptions;

beforeEach(async () => {
  scratchRoot = await mkdtemp(path.join(os.tmpdir(), "client-results-test-"));
  options = { workflowFile: "handle-result.yaml", scratchRoot };
});

afterEach(async () => {
  await rm(scratchRoot, { recursive: true, force: true });
});

describe("parseResultBranch", () => {
  it("splits client id and build number", () => {
    expect(parseResultBranch("result-alpha-42")).toEqual({
      clientId: "alpha",
      buildNumber: 42,
    });
  });

  it("keeps dashes inside the client id", () => {
    expect(parseResultBranch("result-build-host-a-7")).toEqual({
      clientId: "build-host-a",
      buildNumber: 7,
    });
  });

  it("rejects branches that break the naming convention", () => {
    expect(() => parseResultBranch("main")).toThrow(ContractViolationError);
    expect(() => parseResultBranch("result-alpha-x")).toThrow(
      ContractViolationError,
    );
    expect(() => parseResultBranch(null)).toThrow(ContractViolationError);
  });
});

describe("collectClientResults", () => {
  it("turns a failed processing run into a client error", async () => {
    const run = makeRun({
      event: "push",
      headBranch: "result-alpha-42",
      conclusion: "failure",
    });
    const api = new FakeActionsApi({
      runs: { "handle-result.yaml": [run] },
    });

    const results = await collectClientResults(api, options, CUTOFF);

    expect(results).toEqual([
      {
        kind: "error",
        clientId: "alpha",
        buildNumber: 42,
        timestamp: new Date(run.createdAt),
        url: run.htmlUrl,
      },
    ]);
    expect(api.downloads).toEqual([]);
  });

  it("reads per-test outcomes from the single artifact", async () => {
    const run = makeRun({ headBranch: "result-beta-9", checkSuiteId: 321 });
    const api = new FakeActionsApi({
      repoSlug: "example/client-jobs",
      runs: { "handle-result.yaml": [run] },
      artifacts: { [run.id]: [{ id: 77, name: "results" }] },
      archives: {
        77: makeZip({
          "unit.rc": "0\n",
          "integration.rc": "1\n",
          "unit.log": "all good",
          "nested/extra.rc": "0",
        }),
      },
    });

    const results = await collectClientResults(api, options, CUTOFF);

    expect(results).toHaveLength(1);
    const [result] = results;
    expect(result?.kind).toBe("run");
    if (result?.kind === "run") {
      expect(result.clientId).toBe("beta");
      expect(result.buildNumber).toBe(9);
      expect(result.artifactUrl).toBe(
        "https://github.com/example/client-jobs/suites/321/artifacts/77",
      );
      // The archive stores its entries sorted by name.
      expect([...result.tests]).toEqual([
        ["integration", "fail"],
        ["unit", "pass"],
      ]);
    }
    expect(await readdir(scratchRoot)).toEqual([]);
  });

  it("honours a custom result suffix", async () => {
    const run = makeRun({ headBranch: "result-beta-10" });
    const api = new FakeActionsApi({
      runs: { "handle-result.yaml": [run] },
      artifacts: { [run.id]: [{ id: 78, name: "results" }] },
      archives: { 78: makeZip({ "smoke.status": "3", "smoke.rc": "0" }) },
    });

    const results = await collectClientResults(
      api,
      { ...options, resultSuffix: ".status" },
      CUTOFF,
    );

    const [result] = results;
    expect(result?.kind === "run" ? [...result.tests] : []).toEqual([
      ["smoke", "fail"],
    ]);
  });

  it.each([0, 2])("rejects a run with %i artifacts", async (count) => {
    const run = makeRun({ headBranch: "result-gamma-1" });
    const api = new FakeActionsApi({
      runs: { "handle-result.yaml": [run] },
      artifacts: {
        [run.id]: Array.from({ length: count }, (_, index) => ({
          id: index + 1,
          name: `results-${index}`,
        })),
      },
    });

    await expect(
      collectClientResults(api, options, CUTOFF),
    ).rejects.toBeInstanceOf(ContractViolationError);
  });

  it("rejects result files without an integer code and cleans up", async () => {
    const run = makeRun({ headBranch: "result-delta-3" });
    const api = new FakeActionsApi({
      runs: { "handle-result.yaml": [run] },
      artifacts: { [run.id]: [{ id: 5, name: "results" }] },
      archives: { 5: makeZip({ "unit.rc": "passed" }) },
    });

    await expect(
      collectClientResults(api, options, CUTOFF),
    ).rejects.toThrow("Result file unit.rc does not contain an integer return code");
    expect(await readdir(scratchRoot)).toEqual([]);
  });

  it("rejects an archive that is not a zip file", async () => {
    const run = makeRun({ headBranch: "result-delta-4" });
    const api = new FakeActionsApi({
      runs: { "handle-result.yaml": [run] },
      artifacts: { [run.id]: [{ id: 6, name: "results" }] },
      archives: { 6: new Uint8Array([1, 2, 3, 4]) },
    });

    await expect(
      collectClientResults(api, options, CUTOFF),
    ).rejects.toBeInstanceOf(ContractViolationError);
    expect(await readdir(scratchRoot)).toEqual([]);
  });

  it("fails loudly on a malformed branch name", async () => {
    const api = new FakeActionsApi({
      runs: { "handle-result.yaml": [makeRun({ headBranch: "main" })] },
    });

    await expect(
      collectClientResults(api, options, CUTOFF),
    ).rejects.toBeInstanceOf(ContractViolationError);
  });

  it("skips unfinished runs and stops at the window boundary", async () => {
    const pending = makeRun({ status: "queued", headBranch: "main" });
    const recent = makeRun({
      headBranch: "result-alpha-5",
      conclusion: "cancelled",
      createdAt: hoursBeforeNow(3),
    });
    const stale = makeRun({
      headBranch: "not-a-result-branch",
      createdAt: hoursBeforeNow(30),
    });
    const api = new FakeActionsApi({
      runs: { "handle-result.yaml": [pending, recent, stale] },
    });

    const results = await collectClientResults(api, options, CUTOFF);

    expect(results.map((result) => [result.kind, result.buildNumber])).toEqual([
      ["error", 5],
    ]);
    expect(api.yieldedRuns).toEqual([pending.id, recent.id, stale.id]);
  });
});

describe("readTestOutcomes", () => {
  it("records a bare suffix entry as a test with an empty name", async () => {
    const tests = await readTestOutcomes(
      makeZip({ ".rc": "1", "unit.rc": "0" }),
      { scratchRoot },
    );

    expect([...tests]).toEqual([
      ["", "fail"],
      ["unit", "pass"],
    ]);
    expect(await readdir(scratchRoot)).toEqual([]);
  });
});
