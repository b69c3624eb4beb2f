/**
 * Core - Error Taxonomy
 *
 * Raised when a required collaborator is missing or unknown. Failures thrown
 * by strategies and observers themselves are never wrapped in these.
 */
export class CollaboratorError extends Error {
  readonly code: 'INVALID_ARGUMENT' | 'NOT_FOUND'

  constructor(code: CollaboratorError['code'], message: string) {
    super(message)
    this.name = 'CollaboratorError'
    this.code = code
  }
}

export class InvalidArgumentError extends CollaboratorError {
  constructor(message: string) {
    super('INVALID_ARGUMENT', message)
    this.name = 'InvalidArgumentError'
  }
}

export class NotFoundError extends CollaboratorError {
  constructor(message: string) {
    super('NOT_FOUND', message)
    this.name = 'NotFoundError'
  }
}
