import { Octokit } from "@octokit/rest";

const TOKEN_VARIABLES = ["CI_STATUS_GITHUB_TOKEN", "GITHUB_TOKEN"] as const;

export function resolveGithubToken(
  env: NodeJS.ProcessEnv = process.env,
): string | null {
  for (const name of TOKEN_VARIABLES) {
    const token = env[name]?.trim();
    if (token) {
      return token;
    }
  }

  return null;
}

export function createGithubClient(
  token: string | null = resolveGithubToken(),
): Octokit {
  if (!token) {
    throw new Error(
      "GitHub auth is not configured. Set CI_STATUS_GITHUB_TOKEN or GITHUB_TOKEN.",
    );
  }

  return new Octokit({ auth: token, userAgent: "ci-daily-status" });
}
