import { readFile } from "node:fs/promises";
import path from "node:path";

import { parse as parseYaml } from "yaml";

import {
  normalizeClientIds,
  normalizeStatusConfig,
  type StatusConfig,
} from "./schema.js";

export const DEFAULT_CONFIG_PATH = path.join("config", "daily-status.json");

async function readConfigFile(filePath: string, label: string): Promise<string> {
  try {
    return await readFile(filePath, "utf8");
  } catch (error) {
    const errorWithCode = error as NodeJS.ErrnoException;
    if (errorWithCode.code === "ENOENT") {
      throw new Error(`Missing ${label}: ${filePath}`);
    }

    throw error;
  }
}

export async function loadStatusConfig(
  configPath: string = DEFAULT_CONFIG_PATH,
): Promise<StatusConfig> {
  const absolutePath = path.resolve(process.cwd(), configPath);
  const raw = await readConfigFile(absolutePath, "status config");

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new Error(`Status config ${absolutePath} is not valid JSON`, {
      cause: error,
    });
  }

  return normalizeStatusConfig(parsed);
}

export async function loadClientIds(clientsFile: string): Promise<Set<string>> {
  const absolutePath = path.resolve(process.cwd(), clientsFile);
  const raw = await readConfigFile(absolutePath, "client list");
  const parsed: unknown = parseYaml(raw);
  return normalizeClientIds(parsed);
}
