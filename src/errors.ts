export type RecordsErrorCode =
	| 'NOT_FOUND'
	| 'DUPLICATE_ENROLLMENT'
	| 'INVALID_SCORE'
	| 'ALLOCATION_CONFLICT'
	| 'VALIDATION_ERROR'
	| 'CAPABILITY_REQUIRED'

export type ErrorKey = Record<string, string | number>

// Subclass names must not match an IndexedDB DOMException name (NotFoundError,
// ConstraintError...): Dexie rewraps those when they leave a transaction.
export class RecordsError extends Error {
	readonly code: RecordsErrorCode
	readonly key: ErrorKey

	constructor(code: RecordsErrorCode, message: string, key: ErrorKey = {}) {
		super(message)
		this.name = new.target.name
		this.code = code
		this.key = key
	}
}

export class RecordNotFoundError extends RecordsError {
	constructor(entity: string, key: ErrorKey) {
		super('NOT_FOUND', `${entity} not found`, { entity, ...key })
	}
}

export class DuplicateEnrollmentError extends RecordsError {
	constructor(key: ErrorKey) {
		super('DUPLICATE_ENROLLMENT', 'Student is already enrolled in this course for the term', key)
	}
}

export class InvalidScoreError extends RecordsError {
	constructor(marks: number) {
		super('INVALID_SCORE', `Marks must be between 0 and 100, got ${marks}`, { marks })
	}
}

export class AllocationConflictError extends RecordsError {
	constructor(prefix: string, attempts: number) {
		super('ALLOCATION_CONFLICT', `Could not allocate a student ID for ${prefix} after ${attempts} attempts`, {
			prefix,
			attempts,
		})
	}
}

export class ValidationError extends RecordsError {
	constructor(field: string, message: string) {
		super('VALIDATION_ERROR', message, { field })
	}
}

export class CapabilityRequiredError extends RecordsError {
	constructor(capability: string) {
		super('CAPABILITY_REQUIRED', `Capability "${capability}" was not granted`, { capability })
	}
}

export function isRecordsError(e: unknown): e is RecordsError {
	return e instanceof RecordsError
}
