import type { ZodError } from 'zod'

export class ValidationError extends Error {
  readonly model: string
  readonly issues: string[]

  constructor(model: string, issues: string[]) {
    super(`Invalid ${model}: ${issues.join('; ')}`)
    this.name = 'ValidationError'
    this.model = model
    this.issues = issues
  }

  static fromZod(model: string, error: ZodError): ValidationError {
    return new ValidationError(
      model,
      error.issues.map((issue) => issue.message)
    )
  }
}
