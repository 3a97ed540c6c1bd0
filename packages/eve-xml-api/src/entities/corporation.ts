import {
	createEveAllianceId,
	createEveCharacterId,
	createEveCorporationId,
	parseEveId,
} from '@eve-xml/eve-types'

import { toInteger, toNumber } from '../fields'
import { Resolvable } from '../resolvable'
import { Alliance } from './alliance'

import type { ResolutionState } from '../resolvable'
import type { ApiContext, CorporationFields, MembershipInterval } from '../types'
import type { ApiDocument } from '../xml'

export function parseCorporationSheet(document: ApiDocument): Partial<CorporationFields> {
	return {
		corporationId: parseEveId(document.firstValue('result/corporationID'), createEveCorporationId),
		name: document.firstValue('result/corporationName'),
		ticker: document.firstValue('result/ticker'),
		ceoId: parseEveId(document.firstValue('result/ceoID'), createEveCharacterId),
		ceoName: document.firstValue('result/ceoName'),
		description: document.firstValue('result/description'),
		url: document.firstValue('result/url'),
		allianceId: parseEveId(document.firstValue('result/allianceID'), createEveAllianceId),
		allianceName: document.firstValue('result/allianceName'),
		taxRate: toNumber(document.firstValue('result/taxRate')),
		memberCount: toInteger(document.firstValue('result/memberCount')),
		memberLimit: toInteger(document.firstValue('result/memberLimit')),
		shares: toInteger(document.firstValue('result/shares')),
	}
}

/**
 * A corporation, resolved from `corp/CorporationSheet`.
 *
 * The credential goes along only when the key covers this corporation; the
 * public sheet omits the private fields. A cached public sheet is fetched
 * again once when a covering key asks for it.
 *
 * `startDate` and `endDate` describe the membership the instance was handed
 * out for (an employment stint, an alliance membership). Reading them never
 * fetches anything.
 */
export class Corporation {
	private readonly record: Resolvable<CorporationFields>
	readonly startDate?: Date
	readonly endDate?: Date

	constructor(
		private readonly context: ApiContext,
		readonly corporationId: number,
		preset: Partial<CorporationFields> = {},
		interval: MembershipInterval = {}
	) {
		this.startDate = interval.startDate
		this.endDate = interval.endDate
		this.record = new Resolvable<CorporationFields>(() => this.resolveFields(), {
			...preset,
			corporationId: createEveCorporationId(corporationId),
		})
	}

	get status(): ResolutionState {
		return this.record.status
	}

	get<K extends keyof CorporationFields>(key: K): Promise<CorporationFields[K] | undefined> {
		return this.record.get(key)
	}

	peek<K extends keyof CorporationFields>(key: K): CorporationFields[K] | undefined {
		return this.record.peek(key)
	}

	set<K extends keyof CorporationFields>(key: K, value: CorporationFields[K]): void {
		this.record.set(key, value)
	}

	resolve(): Promise<void> {
		return this.record.resolve()
	}

	snapshot(): Readonly<Partial<CorporationFields>> {
		return this.record.snapshot()
	}

	/**
	 * The corporation's alliance, not yet resolved
	 */
	async alliance(): Promise<Alliance | undefined> {
		const allianceId = await this.get('allianceId')
		if (allianceId === undefined) {
			return undefined
		}
		return new Alliance(this.context, { id: allianceId }, { name: this.peek('allianceName') })
	}

	isCached(now: Date = new Date()): boolean {
		return this.context.cache.corporations.isFresh(this.corporationId, now)
	}

	private async resolveFields(): Promise<Partial<CorporationFields>> {
		const { cache, credential, dispatcher } = this.context
		const id = this.corporationId

		const entry = cache.corporations.entry(id)
		if (entry?.authenticated) {
			return entry.fields
		}

		const inScope = credential ? await credential.isValidForCorporation(id) : false
		if (entry && !inScope) {
			return entry.fields
		}

		const { document, request } = await dispatcher.send(
			'corp/CorporationSheet',
			{ corporation_id: id },
			credential
		)

		return cache.corporations.put(id, parseCorporationSheet(document), {
			cachedUntil: document.cachedUntil,
			authenticated: request.authenticated,
		})
	}
}
