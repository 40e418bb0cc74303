import { z } from "zod";

const repoSlugSchema = z
  .string()
  .trim()
  .regex(/^[A-Za-z0-9_.-]+\/[A-Za-z0-9_.-]+$/, "Expected owner/repo");

export const DEFAULT_LOOKBACK_HOURS = 24;

export const statusConfigSchema = z.object({
  workflowRepo: repoSlugSchema,
  workflows: z.array(z.string().trim().min(1)).min(1),
  clients: z.object({
    repo: repoSlugSchema,
    workflow: z.string().trim().min(1).default("handle-result.yaml"),
    file: z.string().trim().min(1),
    resultSuffix: z.string().min(1).default(".rc"),
  }),
  appveyor: z.object({
    project: repoSlugSchema,
    baseUrl: z.string().url().default("https://ci.appveyor.com"),
    pageSize: z.number().int().positive().max(100).default(20),
  }),
  lookbackHours: z.number().positive().default(DEFAULT_LOOKBACK_HOURS),
});

export type StatusConfig = z.infer<typeof statusConfigSchema>;

// Client metadata is free-form; only the ids matter to the report.
export const clientInfoSchema = z.record(z.string(), z.unknown());

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const field = issue.path.join(".") || "(root)";
      return `${field}: ${issue.message}`;
    })
    .join("; ");
}

export function normalizeStatusConfig(value: unknown): StatusConfig {
  const parsed = statusConfigSchema.safeParse(value);
  if (!parsed.success) {
    throw new Error(`Invalid status config: ${describeIssues(parsed.error)}`);
  }

  return parsed.data;
}

export function normalizeClientIds(value: unknown): Set<string> {
  const parsed = clientInfoSchema.safeParse(value ?? {});
  if (!parsed.success) {
    throw new Error(
      `Invalid client list: ${describeIssues(parsed.error)}. Expected a mapping of client id to metadata`,
    );
  }

  return new Set(Object.keys(parsed.data));
}
