import { isValid, parseISO, subSeconds } from 'date-fns'

// Largest timestamp a Date can hold (±8.64e15 ms from the epoch)
const MAX_TIMESTAMP = 8_640_000_000_000_000

const API_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}(?: \d{2}:\d{2}:\d{2})?$/

/**
 * Parse a timestamp as the API writes it: `YYYY-MM-DD HH:MM:SS`, always UTC.
 * A bare date is read as midnight UTC.
 *
 * @returns the parsed Date, or undefined for absent or unparseable input
 */
export function parseApiDate(value: string | undefined): Date | undefined {
	if (value === undefined) {
		return undefined
	}

	const trimmed = value.trim()
	if (!API_DATE_PATTERN.test(trimmed)) {
		return undefined
	}

	const iso = trimmed.length === 10 ? `${trimmed}T00:00:00Z` : `${trimmed.replace(' ', 'T')}Z`
	const date = parseISO(iso)
	return isValid(date) ? date : undefined
}

/**
 * The instant just before `date`, at the API's one-second resolution
 */
export function oneSecondBefore(date: Date): Date {
	return subSeconds(date, 1)
}

/**
 * Expiry used for keys without an expiration. It is an ordinary Date, so it
 * compares later than every real timestamp.
 */
export function neverExpires(): Date {
	return new Date(MAX_TIMESTAMP)
}

export function isNeverExpiring(date: Date): boolean {
	return date.getTime() === MAX_TIMESTAMP
}
