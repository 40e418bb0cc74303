import type { Outcome } from "../types/status.js";

const PAGE_STYLE = `body { font-family: sans-serif; line-height: 1.4; }
      ul { margin: 0.2em 0; }
      p { margin: 0.2em 0; }
      .outcome-pass { color: green; }
      .outcome-fail { color: red; }
      .outcome-error { color: red; font-weight: bold; }
      .outcome-incomplete { color: grey; }`;

const BADGE_LABELS: Record<Outcome, string> = {
  pass: "PASS",
  fail: "FAIL",
  error: "ERROR",
  incomplete: "&#x2014;",
};

export function renderPage(title: string, body: string): string {
  return `<!doctype html>
<html lang="en">
  <head>
    <meta charset="utf-8" />
    <title>${escapeHtml(title)}</title>
    <style>
      ${PAGE_STYLE}
    </style>
  </head>
  <body>
${body}
  </body>
</html>`;
}

export function outcomeBadge(outcome: Outcome): string {
  return `<span class="outcome-${outcome}">${BADGE_LABELS[outcome]}</span>`;
}

export function link(href: string, text: string): string {
  return `<a href="${escapeHtml(href)}">${escapeHtml(text)}</a>`;
}

export function escapeHtml(input: string): string {
  return input
    .replaceAll("&", "&amp;")
    .replaceAll("<", "&lt;")
    .replaceAll(">", "&gt;")
    .replaceAll('"', "&quot;")
    .replaceAll("'", "&#39;");
}
