import { describe, expect, it } from "vitest";

import { buildReport, type BuildReportInput } from "../../status/aggregate.js";
import type { ClientResult, Outcome } from "../../types/status.js";
import { renderHtmlReport } from "../html-report.js";
import { escapeHtml, outcomeBadge } from "../render.js";

const at = new Date("2024-05-02T08:30:00Z");

function input(overrides: Partial<BuildReportInput> = {}): BuildReportInput {
  return {
    repo: "example/project",
    expectedWorkflows: ["build-ubuntu.yaml"],
    workflowRuns: [],
    clientResults: [],
    knownClients: ["alpha"],
    thirdPartyBuilds: [],
    ...overrides,
  };
}

function clientRun(buildNumber: number): ClientResult {
  return {
    kind: "run",
    clientId: "alpha",
    buildNumber,
    timestamp: at,
    artifactUrl: `https://github.com/example/client-jobs/suites/9/artifacts/${buildNumber}`,
    tests: new Map<string, Outcome>([
      ["unit", "pass"],
      ["integration", "fail"],
    ]),
  };
}

describe("renderHtmlReport", () => {
  it("renders placeholders when nothing ran", () => {
    const { subject, body } = renderHtmlReport(buildReport(input()));

    expect(subject).toBe("example/project daily summary: NOTHING");
    expect(body.startsWith("<!doctype html>\n")).toBe(true);
    expect(body).toContain(
      "    <title>example/project daily summary: NOTHING</title>",
    );
    expect(body).toContain(
      "<li>\n<p>GitHub Actions:</p>\n<ul>\n<li>[no runs]</li>\n</ul>\n</li>",
    );
    expect(body).toContain(
      "<li>\n<p>Local Clients:</p>\n<ul>\n<li>[no runs]</li>\n</ul>\n</li>",
    );
    expect(body).toContain(
      "<li>\n<p>AppVeyor Builds:</p>\n<ul>\n<li>[no builds]</li>\n</ul>\n</li>",
    );
  });

  it("renders workflow runs with their jobs", () => {
    const { subject, body } = renderHtmlReport(
      buildReport(
        input({
          workflowRuns: [
            {
              file: "build-ubuntu.yaml",
              name: "Build on Ubuntu",
              runNumber: 12,
              url: "https://github.com/example/project/actions/runs/12",
              timestamp: at,
              outcome: "pass",
              jobs: [
                {
                  name: "test <unit>",
                  url: "https://github.com/example/project/actions/runs/12/job/1",
                  timestamp: at,
                  outcome: "pass",
                },
                {
                  name: "test-integration",
                  url: "https://github.com/example/project/actions/runs/12/job/2",
                  timestamp: at,
                  outcome: "fail",
                },
              ],
            },
          ],
          knownClients: [],
        }),
      ),
    );

    expect(subject).toBe("example/project daily summary: 1 PASSED, 1 FAILED");
    expect(body).toContain(
      [
        '<li><p><span class="outcome-pass">PASS</span> <a href="https://github.com/example/project/actions/runs/12">Build on Ubuntu #12</a> 2024-05-02T08:30:00Z</p>',
        "<ul>",
        '<li><span class="outcome-pass">PASS</span> <a href="https://github.com/example/project/actions/runs/12/job/1">test &lt;unit&gt;</a> 2024-05-02T08:30:00Z</li>',
        '<li><span class="outcome-fail">FAIL</span> <a href="https://github.com/example/project/actions/runs/12/job/2">test-integration</a> 2024-05-02T08:30:00Z</li>',
        "</ul></li>",
      ].join("\n"),
    );
  });

  it("anchors only the first result of each client", () => {
    const { body } = renderHtmlReport(
      buildReport(
        input({
          clientResults: [
            clientRun(41),
            clientRun(42),
            {
              kind: "error",
              clientId: "alpha",
              buildNumber: 43,
              timestamp: at,
              url: "https://github.com/example/client-jobs/actions/runs/77",
            },
          ],
        }),
      ),
    );

    expect(body.match(/id="alpha"/g)).toHaveLength(1);
    expect(body).toContain(
      '<li id="alpha"><p>alpha #41 [<a href="https://github.com/example/client-jobs/suites/9/artifacts/41">download logs</a>] 2024-05-02T08:30:00Z</p>',
    );
    expect(body).toContain(
      '<li><p>alpha #42 [<a href="https://github.com/example/client-jobs/suites/9/artifacts/42">download logs</a>] 2024-05-02T08:30:00Z</p>',
    );
    expect(body).toContain(
      '<li><span class="outcome-error">ERROR</span> processing results for alpha #43 [<a href="https://github.com/example/client-jobs/actions/runs/77">logs</a>] 2024-05-02T08:30:00Z</li>',
    );
    expect(body).toContain(
      '<li><span class="outcome-fail">FAIL</span> integration</li>',
    );
  });

  it("renders AppVeyor builds and jobs", () => {
    const { subject, body } = renderHtmlReport(
      buildReport(
        input({
          knownClients: [],
          thirdPartyBuilds: [
            {
              id: 501,
              version: "10.2024.501",
              url: "https://ci.appveyor.com/project/example/project/builds/501",
              timestamp: at,
              outcome: "incomplete",
              jobs: [
                {
                  buildId: 501,
                  jobId: "abc",
                  name: "Image: Visual Studio",
                  url: "https://ci.appveyor.com/project/example/project/builds/501/job/abc",
                  outcome: "incomplete",
                },
              ],
            },
          ],
        }),
      ),
    );

    expect(subject).toBe(
      "example/project daily summary: 1 INCOMPLETE, 1 ABSENT",
    );
    expect(body).toContain(
      [
        '<li><p><span class="outcome-incomplete">&#x2014;</span> <a href="https://ci.appveyor.com/project/example/project/builds/501">10.2024.501</a> 2024-05-02T08:30:00Z</p>',
        "<ul>",
        '<li><span class="outcome-incomplete">&#x2014;</span> <a href="https://ci.appveyor.com/project/example/project/builds/501/job/abc">Image: Visual Studio</a></li>',
        "</ul></li>",
      ].join("\n"),
    );
  });

  it("is deterministic for identical reports", () => {
    const make = () =>
      buildReport(input({ clientResults: [clientRun(1), clientRun(2)] }));

    expect(renderHtmlReport(make())).toEqual(renderHtmlReport(make()));
  });
});

describe("render helpers", () => {
  it("escapes markup characters", () => {
    expect(escapeHtml(`<a href="x">Tom & 'Jerry'</a>`)).toBe(
      "&lt;a href=&quot;x&quot;&gt;Tom &amp; &#39;Jerry&#39;&lt;/a&gt;",
    );
  });

  it("labels each outcome", () => {
    expect(outcomeBadge("error")).toBe(
      '<span class="outcome-error">ERROR</span>',
    );
  });
});
