#!/usr/bin/env node

import { runReportCommand } from "./commands/report.js";

function printHelp(): void {
  process.stdout.write(`ci-daily-status\n\n`);
  process.stdout.write(`Usage:\n`);
  process.stdout.write(`  ci-daily-status report <outfile> [--config <path>]\n`);
  process.stdout.write(`\n`);
  process.stdout.write(
    `Writes the HTML report body to <outfile> and prints the subject line.\n`,
  );
  process.stdout.write(
    `Reads the GitHub token from CI_STATUS_GITHUB_TOKEN or GITHUB_TOKEN.\n`,
  );
}

function getFlagValue(args: string[], flag: string): string | undefined {
  const flagIndex = args.indexOf(flag);
  if (flagIndex < 0) {
    return undefined;
  }

  return args[flagIndex + 1];
}

function getPositionals(args: string[], flagsWithValues: string[]): string[] {
  const positionals: string[] = [];
  for (let index = 0; index < args.length; index += 1) {
    const arg = args[index];
    if (arg === undefined) {
      continue;
    }
    if (flagsWithValues.includes(arg)) {
      index += 1;
      continue;
    }
    if (!arg.startsWith("--")) {
      positionals.push(arg);
    }
  }

  return positionals;
}

type CommandHandler = (rest: string[]) => Promise<void>;

function createCommandHandlers(): Record<string, CommandHandler> {
  return {
    report: async (rest: string[]) => {
      const [outputPath] = getPositionals(rest, ["--config"]);
      if (!outputPath) {
        throw new Error(
          "Missing output file. Usage: ci-daily-status report <outfile> [--config <path>]",
        );
      }

      const configPath = getFlagValue(rest, "--config");
      await runReportCommand({ outputPath, configPath });
    },
  };
}

async function main(): Promise<void> {
  const [, , command, ...rest] = process.argv;

  if (!command || command === "--help" || command === "-h") {
    printHelp();
    return;
  }

  const handlers = createCommandHandlers();
  const handler = handlers[command];
  if (!handler) {
    throw new Error(`Unknown command: ${command}`);
  }

  await handler(rest);
}

main().catch((error) => {
  const message = error instanceof Error ? error.message : String(error);
  process.stderr.write(`Error: ${message}\n`);
  process.exitCode = 1;
});
