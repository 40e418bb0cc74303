import { mkdtemp, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import AdmZip from "adm-zip";

import { ContractViolationError } from "../errors.js";
import { classifyReturnCode } from "../status/outcome.js";
import type { Outcome } from "../types/status.js";

export const DEFAULT_RESULT_SUFFIX = ".rc";

const RETURN_CODE = /^[+-]?\d+$/;

export interface ReadTestOutcomesOptions {
  resultSuffix?: string;
  /** Parent directory for the scratch copy of the archive. */
  scratchRoot?: string;
}

/**
 * Reads per-test return codes from a client result archive. Only top-level
 * entries named `<test><suffix>` are considered; the entry body holds the
 * test's exit status.
 */
export async function readTestOutcomes(
  archive: Uint8Array,
  options: ReadTestOutcomesOptions = {},
): Promise<Map<string, Outcome>> {
  const suffix = options.resultSuffix ?? DEFAULT_RESULT_SUFFIX;
  const scratchDir = await mkdtemp(
    path.join(options.scratchRoot ?? os.tmpdir(), "client-artifact-"),
  );

  try {
    const archivePath = path.join(scratchDir, "artifact.zip");
    await writeFile(archivePath, archive);

    let entries: AdmZip.IZipEntry[];
    try {
      entries = new AdmZip(archivePath).getEntries();
    } catch (error) {
      throw new ContractViolationError(
        "Client result archive is not a readable zip file",
        { cause: error },
      );
    }

    const tests = new Map<string, Outcome>();
    for (const entry of entries) {
      if (entry.isDirectory || entry.entryName.includes("/")) {
        continue;
      }
      if (!entry.name.endsWith(suffix)) {
        continue;
      }

      const raw = entry.getData().toString("utf8").trim();
      if (!RETURN_CODE.test(raw)) {
        throw new ContractViolationError(
          `Result file ${entry.name} does not contain an integer return code`,
        );
      }

      tests.set(
        entry.name.slice(0, -suffix.length),
        classifyReturnCode(Number.parseInt(raw, 10)),
      );
    }

    return tests;
  } finally {
    await rm(scratchDir, { recursive: true, force: true });
  }
}
