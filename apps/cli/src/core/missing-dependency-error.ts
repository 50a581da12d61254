/**
 * Raised when a supporting tool (git, the Blueprint compiler) cannot be run
 * or has nothing to work on. The CLI exits with status 2 for it.
 */
export class MissingDependencyError extends Error {
  readonly exitCode = 2;

  constructor(
    message: string,
    public tool: string,
    public suggestion?: string,
    public override readonly cause?: Error
  ) {
    super(message);
    this.name = 'MissingDependencyError';
  }

  override toString(): string {
    let output = this.message;
    if (this.suggestion) {
      output += `\n   💡 Suggestion: ${this.suggestion}`;
    }
    return output;
  }
}
