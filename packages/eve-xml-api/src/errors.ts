/**
 * Base error class for every failure raised by this library
 */
export class EveApiError extends Error {
	public override readonly cause?: Error

	constructor(message: string, cause?: Error) {
		super(message)
		this.name = 'EveApiError'
		this.cause = cause
		// Maintain proper stack trace in V8
		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, EveApiError)
		}
	}
}

/**
 * Thrown before any network activity when an endpoint name is not shaped
 * like `group/Method` (e.g. `eve/SkillTree`)
 */
export class InvalidEndpointError extends EveApiError {
	constructor(public readonly endpoint: string) {
		super(`Invalid endpoint name: ${JSON.stringify(endpoint)}`)
		this.name = 'InvalidEndpointError'
	}
}

/**
 * Thrown when an endpoint that always needs a key is called without one
 */
export class MissingCredentialError extends EveApiError {
	constructor(public readonly endpoint: string) {
		super(`Endpoint ${endpoint} requires a key id and verification code`)
		this.name = 'MissingCredentialError'
	}
}

/**
 * Network or connection failure, including timeouts
 */
export class TransportError extends EveApiError {
	constructor(
		message: string,
		public readonly url: string,
		public readonly timedOut: boolean,
		cause?: Error
	) {
		super(message, cause)
		this.name = 'TransportError'
	}
}

/**
 * The API answered, but not with a usable result: a non-success HTTP status,
 * or an `<error>` element in the document
 */
export class RemoteError extends EveApiError {
	constructor(
		message: string,
		public readonly status: number,
		public readonly statusText: string,
		public readonly code?: number
	) {
		super(message)
		this.name = 'RemoteError'
	}
}

/**
 * The response body was not an API document
 */
export class MalformedResponseError extends EveApiError {
	constructor(
		message: string,
		public readonly endpoint: string,
		cause?: Error
	) {
		super(message, cause)
		this.name = 'MalformedResponseError'
	}
}

/**
 * The API does not recognise the key id / verification code pair
 */
export class InvalidCredentialError extends EveApiError {
	constructor(
		public readonly keyId: number,
		cause?: Error
	) {
		super(`API key ${keyId} was rejected`, cause)
		this.name = 'InvalidCredentialError'
	}
}

/**
 * A write-once field was written a second time with a different value
 */
export class FieldAlreadySetError extends EveApiError {
	constructor(public readonly field: string) {
		super(`Field ${field} is already set and cannot be changed`)
		this.name = 'FieldAlreadySetError'
	}
}

/**
 * Configuration or constructor arguments failed validation
 */
export class ConfigurationError extends EveApiError {
	constructor(
		message: string,
		public readonly validationErrors: unknown
	) {
		super(message)
		this.name = 'ConfigurationError'
	}
}

/**
 * Check whether a value is one of this library's errors
 */
export function isEveApiError(error: unknown): error is EveApiError {
	return error instanceof EveApiError
}

/**
 * Wrap an unknown error in an EveApiError
 */
export function wrapError(error: unknown, message?: string): EveApiError {
	if (error instanceof EveApiError) {
		return error
	}

	if (error instanceof Error) {
		return new EveApiError(message || error.message, error)
	}

	return new EveApiError(message || String(error))
}

/**
 * Normalise a thrown value into an Error
 */
export function toError(error: unknown): Error {
	return error instanceof Error ? error : new Error(String(error))
}
