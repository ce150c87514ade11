export class ConfigurationError extends Error {
  readonly issues: string[]

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}\n  - ${issues.join('\n  - ')}` : message)
    this.name = 'ConfigurationError'
    this.issues = issues
  }
}
