import { sharedEntityCache } from './cache/entity-cache'
import { OnceCache } from './cache/once-cache'
import { loadConfig, parseCredentialInput } from './config'
import { Credential } from './credential'
import { EndpointDispatcher } from './dispatcher'
import { Alliance } from './entities/alliance'
import { Certificate } from './entities/certificate'
import { Character } from './entities/character'
import { Corporation } from './entities/corporation'
import { Skill } from './entities/skill'

import type { EntityCache } from './cache/entity-cache'
import type { ClientConfigInput } from './config'
import type { CredentialScope } from './credential'
import type { AllianceLookup } from './entities/alliance'
import type { HttpTransport } from './transport'
import type { ApiContext, LookupKey } from './types'

export interface SessionOptions {
	/** Overrides for the client configuration; the rest comes from the environment */
	config?: ClientConfigInput
	transport?: HttpTransport
	/** Defaults to the process-wide cache */
	cache?: EntityCache
	/** Replaces the dispatcher built from `config` and `transport` */
	dispatcher?: EndpointDispatcher
}

const CHARACTERS_KEY = 'characters'
const CORPORATIONS_KEY = 'corporations'

/**
 * Entry point bound to one API key. Every entity it hands out shares the
 * session's dispatcher, cache and credential.
 */
export class Session {
	readonly context: ApiContext
	private readonly characterList = new OnceCache<Character[]>()
	private readonly corporationList = new OnceCache<Corporation[]>()

	constructor(
		readonly credential: Credential,
		dispatcher: EndpointDispatcher,
		cache: EntityCache
	) {
		this.context = { dispatcher, cache, credential }
	}

	/**
	 * What the key grants. The first call validates the key.
	 *
	 * @throws InvalidCredentialError when the API does not recognise the key
	 */
	keyInfo(): Promise<CredentialScope> {
		return this.credential.scope()
	}

	async isExpired(now: Date = new Date()): Promise<boolean> {
		return this.credential.isExpired(now)
	}

	/**
	 * Characters on the key, with name, corporation and alliance already set
	 * from the key info
	 */
	characters(): Promise<Character[]> {
		return this.characterList.getOrLoad(CHARACTERS_KEY, async () => {
			const scope = await this.credential.scope()
			return scope.characters.map(
				(character) =>
					new Character(this.context, character.characterId, {
						name: character.name,
						corporationId: character.corporationId,
						corporationName: character.corporationName,
						allianceId: character.allianceId,
						allianceName: character.allianceName,
					})
			)
		})
	}

	/**
	 * Corporations a corporation key covers; empty for other key types
	 */
	corporations(): Promise<Corporation[]> {
		return this.corporationList.getOrLoad(CORPORATIONS_KEY, async () => {
			const scope = await this.credential.scope()
			return scope.corporationIds.map((corporationId) => {
				const listed = scope.characters.find(
					(character) => character.corporationId === corporationId
				)
				return new Corporation(this.context, corporationId, { name: listed?.corporationName })
			})
		})
	}

	/**
	 * Every alliance in the alliance list
	 */
	alliances(): Promise<Alliance[]> {
		return Alliance.all(this.context)
	}

	character(characterId: number): Character {
		return new Character(this.context, characterId)
	}

	corporation(corporationId: number): Corporation {
		return new Corporation(this.context, corporationId)
	}

	alliance(lookup: AllianceLookup): Alliance {
		return new Alliance(this.context, lookup)
	}

	skill(lookup: LookupKey): Skill {
		return new Skill(this.context, lookup)
	}

	certificate(certificateId: number): Certificate {
		return new Certificate(this.context, certificateId)
	}
}

/**
 * Open a session for a key. Nothing is fetched until something is read.
 *
 * @throws ConfigurationError when the key id, verification code or
 * configuration is malformed
 *
 * @example
 * ```ts
 * const session = newSession(1234567, 'test-secret')
 * for (const character of await session.characters()) {
 * 	console.log(await character.get('name'), await character.skills())
 * }
 * ```
 */
export function newSession(
	keyId: number | string,
	vCode: string,
	options: SessionOptions = {}
): Session {
	const input = parseCredentialInput({ keyId, vCode })
	const dispatcher =
		options.dispatcher ??
		new EndpointDispatcher({
			config: loadConfig(options.config),
			transport: options.transport,
		})
	const cache = options.cache ?? sharedEntityCache()
	const credential = new Credential(input.keyId, input.vCode, dispatcher, cache)

	return new Session(credential, dispatcher, cache)
}
