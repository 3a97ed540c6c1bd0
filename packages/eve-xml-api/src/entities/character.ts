import {
	createEveAllianceId,
	createEveCertificateId,
	createEveCharacterId,
	createEveCorporationId,
	createEveSkillId,
	parseEveId,
} from '@eve-xml/eve-types'

import { mergeAbsent } from '../cache/identity-cache'
import { OnceCache } from '../cache/once-cache'
import { parseApiDate } from '../dates'
import { toBoolean, toInteger, toNumber } from '../fields'
import { resolveEmploymentHistory } from '../relationships/employment'
import { Resolvable } from '../resolvable'
import { Alliance } from './alliance'
import { Certificate } from './certificate'
import { Corporation } from './corporation'
import { Skill } from './skill'
import { loadSkillQueue } from './skill-queue'

import type { EveCertificateId } from '@eve-xml/eve-types'
import type { EmploymentInterval } from '../relationships/employment'
import type { ResolutionState } from '../resolvable'
import type { ApiContext, CharacterFields, CharacterSkillRow, EmploymentRecord } from '../types'
import type { ApiDocument } from '../xml'
import type { SkillQueueEntry } from './skill-queue'

/**
 * Fields from the public `eve/CharacterInfo`. With a covering key the same
 * document also carries the account balance and skill points.
 */
export function parseCharacterInfo(document: ApiDocument): Partial<CharacterFields> {
	const employmentHistory: EmploymentRecord[] = []
	for (const row of document.allNodes('result/rowset[@name=employmentHistory]/row')) {
		const corporationId = parseEveId(row.attribute('corporationID'), createEveCorporationId)
		if (corporationId === undefined) {
			continue
		}
		employmentHistory.push({
			recordId: toInteger(row.attribute('recordID')),
			corporationId,
			corporationName: row.attribute('corporationName'),
			startDate: parseApiDate(row.attribute('startDate')),
		})
	}

	return {
		characterId: parseEveId(document.firstValue('result/characterID'), createEveCharacterId),
		name: document.firstValue('result/characterName'),
		race: document.firstValue('result/race'),
		bloodline: document.firstValue('result/bloodline'),
		ancestry: document.firstValue('result/ancestry'),
		corporationId: parseEveId(document.firstValue('result/corporationID'), createEveCorporationId),
		corporationName: document.firstValue('result/corporation'),
		corporationDate: parseApiDate(document.firstValue('result/corporationDate')),
		allianceId: parseEveId(document.firstValue('result/allianceID'), createEveAllianceId),
		allianceName: document.firstValue('result/alliance'),
		securityStatus: toNumber(document.firstValue('result/securityStatus')),
		balance: toNumber(document.firstValue('result/accountBalance')),
		skillPoints: toInteger(document.firstValue('result/skillPoints')),
		employmentHistory,
	}
}

/**
 * Fields from the private `char/CharacterSheet`
 */
export function parseCharacterSheet(document: ApiDocument): Partial<CharacterFields> {
	const skillRows: CharacterSkillRow[] = []
	for (const row of document.allNodes('result/rowset[@name=skills]/row')) {
		const skillId = parseEveId(row.attribute('typeID'), createEveSkillId)
		if (skillId === undefined) {
			continue
		}
		skillRows.push({
			skillId,
			skillPoints: toInteger(row.attribute('skillpoints')),
			level: toInteger(row.attribute('level')),
			published: toBoolean(row.attribute('published')),
		})
	}

	const certificateIds: EveCertificateId[] = []
	for (const row of document.allNodes('result/rowset[@name=certificates]/row')) {
		const certificateId = parseEveId(row.attribute('certificateID'), createEveCertificateId)
		if (certificateId !== undefined) {
			certificateIds.push(certificateId)
		}
	}

	return {
		characterId: parseEveId(document.firstValue('result/characterID'), createEveCharacterId),
		name: document.firstValue('result/name'),
		dateOfBirth: parseApiDate(document.firstValue('result/DoB')),
		race: document.firstValue('result/race'),
		bloodline: document.firstValue('result/bloodLine'),
		ancestry: document.firstValue('result/ancestry'),
		gender: document.firstValue('result/gender'),
		corporationId: parseEveId(document.firstValue('result/corporationID'), createEveCorporationId),
		corporationName: document.firstValue('result/corporationName'),
		allianceId: parseEveId(document.firstValue('result/allianceID'), createEveAllianceId),
		allianceName: document.firstValue('result/allianceName'),
		cloneName: document.firstValue('result/cloneName'),
		balance: toNumber(document.firstValue('result/balance')),
		skillRows,
		certificateIds,
	}
}

const SKILL_QUEUE_KEY = 'queue'

/**
 * A character, resolved from the public `eve/CharacterInfo` and, when the
 * session's key covers the character, the private `char/CharacterSheet`.
 * Resolution makes at most those two calls.
 *
 * A cached snapshot taken without the key does not satisfy a key that covers
 * the character; one taken with the key satisfies everyone.
 *
 * @example
 * ```ts
 * const character = new Character(context, 90000001)
 * await character.get('name')
 * const skills = await character.skills()
 * ```
 */
export class Character {
	private readonly record: Resolvable<CharacterFields>
	private readonly queue = new OnceCache<SkillQueueEntry[]>()

	constructor(
		private readonly context: ApiContext,
		readonly characterId: number,
		preset: Partial<CharacterFields> = {}
	) {
		this.record = new Resolvable<CharacterFields>(() => this.resolveFields(), {
			...preset,
			characterId: createEveCharacterId(characterId),
		})
	}

	get status(): ResolutionState {
		return this.record.status
	}

	get<K extends keyof CharacterFields>(key: K): Promise<CharacterFields[K] | undefined> {
		return this.record.get(key)
	}

	peek<K extends keyof CharacterFields>(key: K): CharacterFields[K] | undefined {
		return this.record.peek(key)
	}

	set<K extends keyof CharacterFields>(key: K, value: CharacterFields[K]): void {
		this.record.set(key, value)
	}

	resolve(): Promise<void> {
		return this.record.resolve()
	}

	snapshot(): Readonly<Partial<CharacterFields>> {
		return this.record.snapshot()
	}

	/**
	 * Trained skills, with `level` and `skillPoints` set. Empty unless the
	 * key covers this character.
	 */
	async skills(): Promise<Skill[]> {
		const rows = (await this.get('skillRows')) ?? []
		return rows.map(
			(row) =>
				new Skill(
					this.context,
					{ id: row.skillId },
					{ level: row.level, skillPoints: row.skillPoints, published: row.published }
				)
		)
	}

	/**
	 * Granted certificates. Empty unless the key covers this character.
	 */
	async certificates(): Promise<Certificate[]> {
		const ids = (await this.get('certificateIds')) ?? []
		return ids.map((id) => new Certificate(this.context, id))
	}

	/**
	 * Employment history, newest first, with inferred end dates
	 */
	async employmentHistory(): Promise<EmploymentInterval[]> {
		const records = (await this.get('employmentHistory')) ?? []
		return resolveEmploymentHistory(this.context, records)
	}

	/**
	 * Every corporation the character has belonged to, newest first.
	 * Repeated stints appear once per stint.
	 */
	async corporations(): Promise<Corporation[]> {
		const history = await this.employmentHistory()
		return history.map((interval) => interval.corporation)
	}

	/**
	 * The current corporation, not yet resolved
	 */
	async corporation(): Promise<Corporation | undefined> {
		const corporationId = await this.get('corporationId')
		if (corporationId === undefined) {
			return undefined
		}
		return new Corporation(
			this.context,
			corporationId,
			{ name: this.peek('corporationName') },
			{ startDate: this.peek('corporationDate') }
		)
	}

	/**
	 * The current alliance, not yet resolved
	 */
	async alliance(): Promise<Alliance | undefined> {
		const allianceId = await this.get('allianceId')
		if (allianceId === undefined) {
			return undefined
		}
		return new Alliance(this.context, { id: allianceId }, { name: this.peek('allianceName') })
	}

	/**
	 * Training queue, fetched at most once per instance
	 *
	 * @throws MissingCredentialError when the context has no credential
	 */
	skillQueue(): Promise<SkillQueueEntry[]> {
		return this.queue.getOrLoad(SKILL_QUEUE_KEY, () =>
			loadSkillQueue(this.context, this.characterId)
		)
	}

	isCached(now: Date = new Date()): boolean {
		return this.context.cache.characters.isFresh(this.characterId, now)
	}

	private async resolveFields(): Promise<Partial<CharacterFields>> {
		const { cache, credential, dispatcher } = this.context
		const id = this.characterId

		const entry = cache.characters.entry(id)
		if (entry?.authenticated) {
			return entry.fields
		}

		const inScope = credential ? await credential.isValidForCharacter(id) : false
		if (entry && !inScope) {
			return entry.fields
		}

		const info = await dispatcher.send('eve/CharacterInfo', { character_id: id }, credential)
		let fields = parseCharacterInfo(info.document)
		let authenticated = info.request.authenticated
		let cachedUntil = info.document.cachedUntil

		if (inScope && credential) {
			const sheet = await dispatcher.call('char/CharacterSheet', { character_id: id }, credential)
			fields = mergeAbsent<CharacterFields>(fields, parseCharacterSheet(sheet))
			authenticated = true
			if (sheet.cachedUntil && (!cachedUntil || sheet.cachedUntil < cachedUntil)) {
				cachedUntil = sheet.cachedUntil
			}
		}

		return cache.characters.put(id, fields, { cachedUntil, authenticated })
	}
}
