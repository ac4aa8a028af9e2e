/**
 * The rulebook file could not be read or parsed.
 */
export class RulebookLoadError extends Error {
  constructor(
    message: string,
    public readonly source?: string
  ) {
    super(source === undefined ? message : `${message} (${source})`);
    this.name = 'RulebookLoadError';
  }
}

export interface RulebookIssue {
  path: string;
  message: string;
}

/**
 * The rulebook parsed but violates the rule definition model.
 */
export class RulebookValidationError extends Error {
  readonly fieldPaths: string[];

  constructor(
    public readonly issues: RulebookIssue[],
    public readonly source?: string
  ) {
    const summary = issues.map((issue) => `${issue.path || '<root>'}: ${issue.message}`).join('; ');
    super(`Invalid rulebook${source === undefined ? '' : ` (${source})`}: ${summary}`);
    this.name = 'RulebookValidationError';
    this.fieldPaths = [...new Set(issues.map((issue) => issue.path))];
  }
}
