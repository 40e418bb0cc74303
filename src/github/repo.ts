export interface GithubRepoRef {
  owner: string;
  repo: string;
}

export function parseGithubRepoSpec(spec: string): GithubRepoRef {
  const trimmed = spec.replace(/^github:/, "").trim();
  const match = trimmed.match(/^([A-Za-z0-9_.-]+)\/([A-Za-z0-9_.-]+)$/);
  if (!match?.[1] || !match[2]) {
    throw new Error(
      `Invalid GitHub repo spec "${spec}". Expected owner/repo`,
    );
  }

  return {
    owner: match[1],
    repo: match[2],
  };
}

export function formatGithubRepo(ref: GithubRepoRef): string {
  return `${ref.owner}/${ref.repo}`;
}
