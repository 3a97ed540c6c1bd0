import { WorkersLogger } from 'workers-tagged-logger'

/**
 * Shared tagged logger. Call sites attach a `type` tag describing the event
 * (e.g. `eve_api_request_completed`) plus whatever ids identify the target.
 */
export const logger = new WorkersLogger()

/**
 * Replace the verification code in a request URL so it can be logged
 */
export function redactUrl(url: string): string {
	return url.replace(/([?&]vCode=)[^&]*/g, '$1[redacted]')
}
