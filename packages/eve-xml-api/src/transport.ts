import { TransportError, toError } from './errors'
import { redactUrl } from './logger'

export interface HttpResponse {
	status: number
	statusText: string
	body: string
}

export interface HttpRequestOptions {
	timeoutMs: number
	userAgent: string
}

/**
 * Performs a single GET and returns the raw body. Implementations throw
 * {@link TransportError} when no response could be obtained; any HTTP status
 * counts as a response.
 */
export type HttpTransport = (url: string, options: HttpRequestOptions) => Promise<HttpResponse>

/**
 * Default transport on the global `fetch`, aborting after `timeoutMs`
 */
export const fetchTransport: HttpTransport = async (url, { timeoutMs, userAgent }) => {
	try {
		const response = await fetch(url, {
			headers: {
				Accept: 'application/xml, text/xml',
				'User-Agent': userAgent,
			},
			signal: AbortSignal.timeout(timeoutMs),
		})

		return {
			status: response.status,
			statusText: response.statusText,
			body: await response.text(),
		}
	} catch (error) {
		const cause = toError(error)
		const timedOut = cause.name === 'TimeoutError'
		const safeUrl = redactUrl(url)
		throw new TransportError(
			timedOut
				? `Request to ${safeUrl} timed out after ${timeoutMs}ms`
				: `Request to ${safeUrl} failed: ${cause.message}`,
			safeUrl,
			timedOut,
			cause
		)
	}
}
