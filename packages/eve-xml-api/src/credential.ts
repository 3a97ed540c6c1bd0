import {
	createEveAllianceId,
	createEveCharacterId,
	createEveCorporationId,
	parseEveId,
} from '@eve-xml/eve-types'

import { neverExpires, parseApiDate } from './dates'
import { InvalidCredentialError, RemoteError } from './errors'
import { toInteger } from './fields'
import { logger } from './logger'

import type { EveAllianceId, EveCharacterId, EveCorporationId } from '@eve-xml/eve-types'
import type { ScopedCredential } from './authorization'
import type { EntityCache } from './cache/entity-cache'
import type { EndpointDispatcher } from './dispatcher'

export type KeyType = 'Account' | 'Character' | 'Corporation'

const KEY_TYPES: ReadonlySet<string> = new Set<KeyType>(['Account', 'Character', 'Corporation'])

function isKeyType(value: string | undefined): value is KeyType {
	return value !== undefined && KEY_TYPES.has(value)
}

/** A character listed on a key */
export interface KeyCharacter {
	characterId: EveCharacterId
	name?: string
	corporationId?: EveCorporationId
	corporationName?: string
	allianceId?: EveAllianceId
	allianceName?: string
}

/**
 * What a key grants, from `account/APIKeyInfo`
 */
export interface CredentialScope {
	type: KeyType
	accessMask: number
	/** Expiration, or {@link neverExpires} for keys without one */
	expires: Date
	characterIds: ReadonlyArray<EveCharacterId>
	/** Only populated for corporation keys */
	corporationIds: ReadonlyArray<EveCorporationId>
	characters: ReadonlyArray<KeyCharacter>
}

// API error codes 200-299 are authentication failures
function isRejection(error: unknown): error is RemoteError {
	if (!(error instanceof RemoteError)) {
		return false
	}
	return error.status === 403 || (error.code !== undefined && error.code >= 200 && error.code < 300)
}

/**
 * Ask the API what a key grants.
 *
 * @throws InvalidCredentialError when the API does not recognise the key
 */
export async function resolveCredentialScope(
	dispatcher: EndpointDispatcher,
	keyId: number,
	vCode: string
): Promise<CredentialScope> {
	let document
	try {
		document = await dispatcher.call('account/APIKeyInfo', { key_id: keyId, v_code: vCode })
	} catch (error) {
		if (isRejection(error)) {
			logger
				.withTags({
					type: 'eve_api_credential_rejected',
					key_id: keyId,
				})
				.warn('API key rejected', { status: error.status, code: error.code })
			throw new InvalidCredentialError(keyId, error)
		}
		throw error
	}

	const type = document.firstValue('result/key/@type')
	if (!isKeyType(type)) {
		logger
			.withTags({
				type: 'eve_api_credential_rejected',
				key_id: keyId,
			})
			.warn('API key info has no recognised key type', { keyType: type ?? null })
		throw new InvalidCredentialError(keyId)
	}

	const characters: KeyCharacter[] = []
	const corporationIds: EveCorporationId[] = []

	for (const row of document.allNodes('result/key/rowset[@name=characters]/row')) {
		const characterId = parseEveId(row.attribute('characterID'), createEveCharacterId)
		if (characterId === undefined) {
			continue
		}
		const corporationId = parseEveId(row.attribute('corporationID'), createEveCorporationId)
		characters.push({
			characterId,
			name: row.attribute('characterName'),
			corporationId,
			corporationName: row.attribute('corporationName'),
			allianceId: parseEveId(row.attribute('allianceID'), createEveAllianceId),
			allianceName: row.attribute('allianceName'),
		})
		if (type === 'Corporation' && corporationId !== undefined) {
			corporationIds.push(corporationId)
		}
	}

	const scope: CredentialScope = {
		type,
		accessMask: toInteger(document.firstValue('result/key/@accessMask')) ?? 0,
		expires: parseApiDate(document.firstValue('result/key/@expires')) ?? neverExpires(),
		characterIds: characters.map((character) => character.characterId),
		corporationIds,
		characters,
	}

	logger
		.withTags({
			type: 'eve_api_credential_resolved',
			key_id: keyId,
		})
		.info('API key resolved', {
			keyType: scope.type,
			accessMask: scope.accessMask,
			characterCount: scope.characterIds.length,
		})

	return scope
}

/**
 * A key id and verification code. Its scope is fetched on first use and
 * shared, through the cache, with every Credential built for the same pair.
 */
export class Credential implements ScopedCredential {
	constructor(
		readonly keyId: number,
		readonly vCode: string,
		private readonly dispatcher: EndpointDispatcher,
		private readonly cache: EntityCache
	) {}

	private get cacheKey(): string {
		return `${this.keyId}/${this.vCode}`
	}

	/**
	 * @throws InvalidCredentialError when the API does not recognise the key
	 */
	scope(): Promise<CredentialScope> {
		return this.cache.credentials.getOrLoad(this.cacheKey, () =>
			resolveCredentialScope(this.dispatcher, this.keyId, this.vCode)
		)
	}

	/**
	 * The scope if it has been resolved, without resolving it
	 */
	peekScope(): CredentialScope | undefined {
		return this.cache.credentials.peek(this.cacheKey)
	}

	async isValidForCharacter(characterId: number): Promise<boolean> {
		const { characterIds } = await this.scope()
		return characterIds.some((id) => id === characterId)
	}

	async isValidForCorporation(corporationId: number): Promise<boolean> {
		const { corporationIds } = await this.scope()
		return corporationIds.some((id) => id === corporationId)
	}

	async isExpired(now: Date = new Date()): Promise<boolean> {
		const { expires } = await this.scope()
		return expires.getTime() < now.getTime()
	}
}
