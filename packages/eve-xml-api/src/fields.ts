// Conversions from the strings an API document carries to field values.
// Every helper maps absent or unparseable input to undefined.

export function toInteger(value: string | undefined): number | undefined {
	if (value === undefined || !/^-?\d+$/.test(value.trim())) {
		return undefined
	}
	const parsed = Number(value)
	return Number.isSafeInteger(parsed) ? parsed : undefined
}

export function toNumber(value: string | undefined): number | undefined {
	if (value === undefined || value.trim() === '') {
		return undefined
	}
	const parsed = Number(value)
	return Number.isFinite(parsed) ? parsed : undefined
}

export function toBoolean(value: string | undefined): boolean | undefined {
	switch (value?.trim().toLowerCase()) {
		case '1':
		case 'true':
			return true
		case '0':
		case 'false':
			return false
		default:
			return undefined
	}
}
