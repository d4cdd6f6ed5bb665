/**
 * Raised when the input record sets cannot be resolved at all. Nothing is
 * scheduled once this is thrown.
 */
export class InputError extends Error {
  public readonly issues: string[]

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message)
    this.name = 'InputError'
    this.issues = issues
  }
}
