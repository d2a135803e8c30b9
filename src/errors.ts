/**
 * Raised when a plot request cannot be satisfied from its options: no gene
 * source, an empty selection, unknown or ill-typed options, or a dataset
 * bundle that does not match its declared shape.
 */
export class ConfigurationError extends Error {
  readonly problems: string[]

  constructor(message: string, problems: string[] = []) {
    super(problems.length > 0 ? `${message}\n  - ${problems.join('\n  - ')}` : message)
    this.name = 'ConfigurationError'
    this.problems = problems
  }
}
