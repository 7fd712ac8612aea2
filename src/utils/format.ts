/**
 * @arch hexgraph.util
 *
 * Formatting helpers shared by findings, formatters and the CLI.
 */

/**
 * Structural view of a Zod error's issues.
 */
export interface IssueList {
  readonly issues: ReadonlyArray<{
    readonly path: ReadonlyArray<PropertyKey>;
    readonly message: string;
  }>;
}

/**
 * Format Zod issues into one line: `path: message; path: message`.
 */
export function formatZodError(error: IssueList): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.map(String).join('.');
      return path ? `${path}: ${issue.message}` : issue.message;
    })
    .join('; ');
}

/**
 * `1 node`, `2 nodes`.
 */
export function pluralize(count: number, singular: string, plural: string = `${singular}s`): string {
  return `${count} ${count === 1 ? singular : plural}`;
}

/**
 * Join node ids for display, truncating long lists.
 */
export function formatNodeList(nodes: readonly string[], max: number = 5): string {
  if (nodes.length <= max) {
    return nodes.join(', ');
  }
  return `${nodes.slice(0, max).join(', ')} (+${nodes.length - max} more)`;
}
