import type { ZodError } from 'zod';

/**
 * Raised when a content file cannot be read, is not JSON, or does not match the schema.
 * `issues` holds one `path: message` line per problem.
 */
export class ContentError extends Error {
  readonly source: string;
  readonly issues: readonly string[];

  constructor(source: string, issues: readonly string[]) {
    super(`${source}: ${issues.length === 1 ? issues[0] : `${issues.length} problems`}`);
    this.name = 'ContentError';
    this.source = source;
    this.issues = issues;
  }

  static fromZod(source: string, error: ZodError): ContentError {
    const issues = error.issues.map((issue) => {
      const at = issue.path.length ? issue.path.join('.') : '(root)';
      return `${at}: ${issue.message}`;
    });
    return new ContentError(source, issues);
  }
}

export class NotFoundError extends Error {
  readonly query: string;

  constructor(kind: 'entry' | 'group', query: string) {
    super(`No ${kind} matches "${query}"`);
    this.name = 'NotFoundError';
    this.query = query;
  }
}
