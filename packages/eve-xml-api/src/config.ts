import { z } from 'zod'

import { ConfigurationError } from './errors'

export const DEFAULT_BASE_URL = 'https://api.eveonline.com'
export const DEFAULT_TIMEOUT_MS = 30_000
export const DEFAULT_USER_AGENT = 'eve-xml-api'

export const clientConfigSchema = z.object({
	baseUrl: z
		.string()
		.url()
		.transform((url) => url.replace(/\/+$/, ''))
		.default(DEFAULT_BASE_URL),
	timeoutMs: z.coerce.number().int().positive().default(DEFAULT_TIMEOUT_MS),
	userAgent: z.string().min(1).default(DEFAULT_USER_AGENT),
})

export type ClientConfig = z.infer<typeof clientConfigSchema>
export type ClientConfigInput = z.input<typeof clientConfigSchema>

/**
 * Key id and verification code as accepted by {@link newSession}.
 * Key ids are numeric; numeric strings (as copied from the key management
 * page) are accepted too.
 */
export const credentialInputSchema = z.object({
	keyId: z.coerce.number().int().positive(),
	vCode: z.string().trim().min(1),
})

export interface CredentialInput {
	keyId: number | string
	vCode: string
}

/**
 * Build the client configuration.
 *
 * Explicit values win over environment variables (`EVE_API_BASE_URL`,
 * `EVE_API_TIMEOUT_MS`, `EVE_API_USER_AGENT`), which win over the defaults.
 *
 * @throws ConfigurationError when a value fails validation
 */
export function loadConfig(
	input: ClientConfigInput = {},
	env: Record<string, string | undefined> = process.env
): ClientConfig {
	const result = clientConfigSchema.safeParse({
		baseUrl: input.baseUrl ?? env.EVE_API_BASE_URL,
		timeoutMs: input.timeoutMs ?? env.EVE_API_TIMEOUT_MS,
		userAgent: input.userAgent ?? env.EVE_API_USER_AGENT,
	})

	if (!result.success) {
		throw new ConfigurationError('Invalid client configuration', result.error.issues)
	}

	return result.data
}

/**
 * Validate a key id / verification code pair
 *
 * @throws ConfigurationError when either value is missing or malformed
 */
export function parseCredentialInput(input: CredentialInput): { keyId: number; vCode: string } {
	const result = credentialInputSchema.safeParse(input)

	if (!result.success) {
		throw new ConfigurationError(
			'Must provide a numeric key id and a verification code',
			result.error.issues
		)
	}

	return result.data
}
