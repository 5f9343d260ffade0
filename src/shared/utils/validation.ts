import type { z } from 'zod/v4';

type Issue = z.ZodError['issues'][number];

/** Render zod issues as `path: message` lines */
export function formatIssues(issues: readonly Issue[]): string[] {
  return issues.map((issue) => {
    const path = issue.path.map(String).join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}
