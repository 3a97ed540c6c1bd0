import { MissingCredentialError } from './errors'

/**
 * A key id and verification code, with or without a resolved scope
 */
export interface CredentialPair {
	readonly keyId: number
	readonly vCode: string
}

/**
 * A credential that can answer whether it covers a given character or
 * corporation. An unknown scope answers false.
 */
export interface ScopedCredential extends CredentialPair {
	isValidForCharacter(characterId: number): Promise<boolean>
	isValidForCorporation(corporationId: number): Promise<boolean>
}

export type RequestParams = Record<string, string | number>

/**
 * How an endpoint treats credentials:
 * - `public`: never sent
 * - `character` / `corporation`: sent only when the key covers the target
 * - `private`: always sent, and required
 */
export type EndpointAccess = 'public' | 'character' | 'corporation' | 'private'

export const PUBLIC_ENDPOINTS: ReadonlySet<string> = new Set([
	'eve/AllianceList',
	'eve/SkillTree',
	'eve/CertificateTree',
])

/** Character-scoped endpoints, mapped to the parameter naming their target */
export const CHARACTER_SCOPED_ENDPOINTS: ReadonlyMap<string, string> = new Map([
	['eve/CharacterInfo', 'character_id'],
])

/** Corporation-scoped endpoints, mapped to the parameter naming their target */
export const CORPORATION_SCOPED_ENDPOINTS: ReadonlyMap<string, string> = new Map([
	['corp/CorporationSheet', 'corporation_id'],
])

export interface AuthorizationDecision {
	access: EndpointAccess
	attach: boolean
}

export function endpointAccess(endpoint: string): EndpointAccess {
	if (PUBLIC_ENDPOINTS.has(endpoint)) return 'public'
	if (CHARACTER_SCOPED_ENDPOINTS.has(endpoint)) return 'character'
	if (CORPORATION_SCOPED_ENDPOINTS.has(endpoint)) return 'corporation'
	return 'private'
}

export function isScopedCredential(
	credential: CredentialPair | ScopedCredential
): credential is ScopedCredential {
	return 'isValidForCharacter' in credential && 'isValidForCorporation' in credential
}

function targetId(params: RequestParams, parameter: string): number | undefined {
	const value = params[parameter]
	if (value === undefined) {
		return undefined
	}
	const id = Number(value)
	return Number.isSafeInteger(id) && id > 0 ? id : undefined
}

/**
 * Decide whether the credential accompanies a call to `endpoint`.
 *
 * @throws MissingCredentialError for a private endpoint without a credential
 */
export async function authorize(
	endpoint: string,
	params: RequestParams,
	credential?: CredentialPair | ScopedCredential
): Promise<AuthorizationDecision> {
	const access = endpointAccess(endpoint)

	switch (access) {
		case 'public':
			return { access, attach: false }

		case 'character':
		case 'corporation': {
			if (!credential || !isScopedCredential(credential)) {
				return { access, attach: false }
			}
			const parameter =
				access === 'character'
					? CHARACTER_SCOPED_ENDPOINTS.get(endpoint)
					: CORPORATION_SCOPED_ENDPOINTS.get(endpoint)
			const id = parameter !== undefined ? targetId(params, parameter) : undefined
			if (id === undefined) {
				return { access, attach: false }
			}
			const attach =
				access === 'character'
					? await credential.isValidForCharacter(id)
					: await credential.isValidForCorporation(id)
			return { access, attach }
		}

		case 'private':
			if (!credential) {
				throw new MissingCredentialError(endpoint)
			}
			return { access, attach: true }
	}
}
