import { BadRequestException, NotFoundException } from '@nestjs/common'
import type { ZodError } from 'zod'

/**
 * Malformed or empty input, rejected before anything is persisted.
 */
export class ValidationError extends BadRequestException {
  constructor(message: string, readonly issues: string[] = []) {
    super({ statusCode: 400, error: 'ValidationError', message, issues })
  }

  static fromZod(context: string, error: ZodError): ValidationError {
    const issues = error.issues.map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join('.') : '(root)'
      return `${path}: ${issue.message}`
    })
    return new ValidationError(`${context} is invalid`, issues)
  }
}

export class NotFoundError extends NotFoundException {
  constructor(readonly entity: 'Plan' | 'Task', readonly id: number) {
    super({ statusCode: 404, error: 'NotFoundError', message: `${entity} ${id} not found` })
  }
}
