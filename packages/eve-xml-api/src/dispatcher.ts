import { authorize } from './authorization'
import { loadConfig } from './config'
import { InvalidEndpointError, RemoteError, TransportError, toError } from './errors'
import { logger, redactUrl } from './logger'
import { fetchTransport } from './transport'
import { parseApiDocument, tryParseApiDocument } from './xml'

import type {
	CredentialPair,
	EndpointAccess,
	RequestParams,
	ScopedCredential,
} from './authorization'
import type { ClientConfig } from './config'
import type { HttpResponse, HttpTransport } from './transport'
import type { ApiDocument } from './xml'

/** `group/Method`, e.g. `char/CharacterSheet` */
export const ENDPOINT_PATTERN = /^[a-z]+\/[A-Za-z]+$/

const KEY_ID_PARAM = 'keyID'
const V_CODE_PARAM = 'vCode'

export interface DispatcherOptions {
	config?: ClientConfig
	transport?: HttpTransport
}

export interface PreparedRequest {
	endpoint: string
	url: string
	access: EndpointAccess
	authenticated: boolean
	/** Query parameters under their remote names, in the order they are sent */
	query: ReadonlyArray<readonly [string, string]>
}

export interface DispatchResult {
	document: ApiDocument
	request: PreparedRequest
}

/**
 * Map this library's snake_case parameter names to the API's casing:
 * `key_id` → `keyID`, `v_code` → `vCode`, `character_id` → `characterID`.
 * Names without underscores pass through unchanged.
 */
export function remoteParameterName(name: string): string {
	if (!name.includes('_')) {
		return name
	}
	const [first = '', ...rest] = name.split('_').filter((part) => part !== '')
	return (
		first +
		rest
			.map((part) =>
				part.toLowerCase() === 'id' ? 'ID' : part.charAt(0).toUpperCase() + part.slice(1)
			)
			.join('')
	)
}

/**
 * Pull `key_id`/`v_code` (under either casing) out of the params. They never
 * pass through as ordinary parameters; the authorization policy decides
 * whether they are sent.
 */
function splitCredential(params: RequestParams): {
	params: RequestParams
	offered?: CredentialPair
} {
	const rest: RequestParams = {}
	let keyId: string | number | undefined
	let vCode: string | number | undefined

	for (const [name, value] of Object.entries(params)) {
		const remote = remoteParameterName(name)
		if (remote === KEY_ID_PARAM) {
			keyId = value
		} else if (remote === V_CODE_PARAM) {
			vCode = value
		} else {
			rest[name] = value
		}
	}

	if (keyId === undefined || vCode === undefined) {
		return { params: rest }
	}
	return { params: rest, offered: { keyId: Number(keyId), vCode: String(vCode) } }
}

function compareNames([a]: readonly [string, string], [b]: readonly [string, string]): number {
	return a < b ? -1 : a > b ? 1 : 0
}

function isSuccess(status: number): boolean {
	return status >= 200 && status < 300
}

/**
 * Builds and issues single API calls.
 *
 * @example
 * ```ts
 * const dispatcher = new EndpointDispatcher()
 * const doc = await dispatcher.call('eve/CharacterInfo', { character_id: 90000001 }, credential)
 * doc.firstValue('result/characterName')
 * ```
 */
export class EndpointDispatcher {
	readonly config: ClientConfig
	private readonly transport: HttpTransport

	constructor(options: DispatcherOptions = {}) {
		this.config = options.config ?? loadConfig()
		this.transport = options.transport ?? fetchTransport
	}

	/**
	 * Validate the endpoint, apply the authorization policy and build the URL
	 * without sending anything.
	 *
	 * @throws InvalidEndpointError for a malformed endpoint name
	 * @throws MissingCredentialError when a private endpoint has no credential
	 */
	async prepare(
		endpoint: string,
		params: RequestParams = {},
		credential?: CredentialPair | ScopedCredential
	): Promise<PreparedRequest> {
		if (!ENDPOINT_PATTERN.test(endpoint)) {
			throw new InvalidEndpointError(endpoint)
		}

		const split = splitCredential(params)
		const effective = credential ?? split.offered
		const decision = await authorize(endpoint, split.params, effective)

		const query = new Map<string, string>()
		for (const [name, value] of Object.entries(split.params)) {
			query.set(remoteParameterName(name), String(value))
		}

		let authenticated = false
		if (decision.attach && effective) {
			query.set(KEY_ID_PARAM, String(effective.keyId))
			query.set(V_CODE_PARAM, effective.vCode)
			authenticated = true
		} else if (effective) {
			logger
				.withTags({
					type: 'eve_api_credential_stripped',
					endpoint,
				})
				.debug('Credential not sent', { keyId: effective.keyId, access: decision.access })
		}

		const pairs = [...query.entries()].sort(compareNames)
		const search = pairs
			.map(([name, value]) => `${encodeURIComponent(name)}=${encodeURIComponent(value)}`)
			.join('&')

		return {
			endpoint,
			url: `${this.config.baseUrl}/${endpoint}.xml.aspx${search ? `?${search}` : ''}`,
			access: decision.access,
			authenticated,
			query: pairs,
		}
	}

	/**
	 * Issue one call and return the parsed document.
	 *
	 * @throws TransportError when no response arrives
	 * @throws RemoteError for a non-success status or an `<error>` document
	 * @throws MalformedResponseError when the body is not an API document
	 */
	async call(
		endpoint: string,
		params: RequestParams = {},
		credential?: CredentialPair | ScopedCredential
	): Promise<ApiDocument> {
		const { document } = await this.send(endpoint, params, credential)
		return document
	}

	/**
	 * Like {@link call}, but also returns the request as sent, so callers can
	 * tell whether the credential was attached.
	 */
	async send(
		endpoint: string,
		params: RequestParams = {},
		credential?: CredentialPair | ScopedCredential
	): Promise<DispatchResult> {
		const request = await this.prepare(endpoint, params, credential)
		const safeUrl = redactUrl(request.url)
		const startedAt = Date.now()

		let response: HttpResponse
		try {
			response = await this.transport(request.url, {
				timeoutMs: this.config.timeoutMs,
				userAgent: this.config.userAgent,
			})
		} catch (error) {
			const failure =
				error instanceof TransportError
					? error
					: new TransportError(
							`Request to ${safeUrl} failed: ${toError(error).message}`,
							safeUrl,
							false,
							toError(error)
						)
			logger
				.withTags({
					type: 'eve_api_request_failed',
					endpoint,
				})
				.error('EVE API request failed', {
					url: safeUrl,
					error: failure.message,
					timedOut: failure.timedOut,
					durationMs: Date.now() - startedAt,
				})
			throw failure
		}

		if (!isSuccess(response.status)) {
			const detail = tryParseApiDocument(response.body)?.error
			logger
				.withTags({
					type: 'eve_api_request_failed',
					endpoint,
				})
				.error('EVE API returned an error status', {
					url: safeUrl,
					status: response.status,
					statusText: response.statusText,
					code: detail?.code,
					durationMs: Date.now() - startedAt,
				})
			throw new RemoteError(
				`${endpoint} responded ${response.status} ${response.statusText}${
					detail ? `: ${detail.message}` : ''
				}`,
				response.status,
				response.statusText,
				detail?.code
			)
		}

		const document = parseApiDocument(response.body, endpoint)

		if (document.error) {
			logger
				.withTags({
					type: 'eve_api_request_failed',
					endpoint,
				})
				.error('EVE API returned an error document', {
					url: safeUrl,
					status: response.status,
					code: document.error.code,
					message: document.error.message,
				})
			throw new RemoteError(
				`${endpoint} returned error ${document.error.code ?? 'unknown'}: ${document.error.message}`,
				response.status,
				response.statusText,
				document.error.code
			)
		}

		logger
			.withTags({
				type: 'eve_api_request_completed',
				endpoint,
			})
			.info('EVE API request completed', {
				url: safeUrl,
				authenticated: request.authenticated,
				durationMs: Date.now() - startedAt,
				cachedUntil: document.cachedUntil ? document.cachedUntil.toISOString() : null,
			})

		return { document, request }
	}
}
