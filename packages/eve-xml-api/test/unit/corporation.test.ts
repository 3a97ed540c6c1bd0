import { describe, expect, it } from 'vitest'

import { EntityCache } from '../../src/cache/entity-cache'
import { Corporation } from '../../src/entities/corporation'
import {
	ALLIANCE_ID,
	CORP_A_ID,
	CORP_B_ID,
	OTHER_CHARACTER_ID,
	PILOT,
	corporationSheetDocument,
	createContext,
	keyInfoDocument,
} from '../helpers'

import type { Route } from '../helpers'

// Corporation key for PILOT, whose corporation is CORP_B_ID
function routes(): Record<string, Route> {
	return {
		'account/APIKeyInfo': keyInfoDocument('Corporation', [PILOT]),
		'corp/CorporationSheet': (call) =>
			corporationSheetDocument(Number(call.query.corporationID), {
				authenticated: call.query.keyID !== undefined,
			}),
	}
}

describe('Corporation', () => {
	it('should resolve the public sheet without a credential', async () => {
		const { api, context } = createContext(routes())
		const corporation = new Corporation(context, CORP_A_ID)

		expect(await corporation.get('name')).toBe('Solen Industries')
		expect(await corporation.get('ticker')).toBe('SOLEN')
		expect(await corporation.get('ceoId')).toBe(OTHER_CHARACTER_ID)
		expect(await corporation.get('taxRate')).toBe(10)
		expect(await corporation.get('memberLimit')).toBeUndefined()

		expect(api.calls).toHaveLength(1)
		expect(api.calls[0]?.query).toEqual({ corporationID: String(CORP_A_ID) })
	})

	it('should reuse the cache across instances', async () => {
		const { api, context } = createContext(routes())
		const first = new Corporation(context, CORP_A_ID)
		await first.resolve()

		const second = new Corporation(context, CORP_A_ID)
		await second.resolve()

		expect(second.snapshot()).toEqual(first.snapshot())
		expect(api.calls).toHaveLength(1)
	})

	it('should send the credential for a corporation the key covers', async () => {
		const { api, context } = createContext(routes(), { withCredential: true })

		expect(await new Corporation(context, CORP_B_ID).get('memberLimit')).toBe(1000)
		expect(api.calls.map((call) => call.endpoint)).toEqual([
			'account/APIKeyInfo',
			'corp/CorporationSheet',
		])
		expect(api.calls[1]?.query).toEqual({
			corporationID: String(CORP_B_ID),
			keyID: '1234567',
			vCode: 'test-secret',
		})
		expect(context.cache.corporations.entry(CORP_B_ID)?.authenticated).toBe(true)
	})

	it('should not send the credential for a corporation the key does not cover', async () => {
		const { api, context } = createContext(routes(), { withCredential: true })

		await new Corporation(context, CORP_A_ID).resolve()

		expect(api.calls[1]?.query).toEqual({ corporationID: String(CORP_A_ID) })
	})

	it('should fetch again once when a covering key finds only a public snapshot', async () => {
		const cache = new EntityCache()
		const anonymous = createContext(routes(), { cache })
		await new Corporation(anonymous.context, CORP_B_ID).resolve()

		const keyed = createContext(routes(), { cache, withCredential: true })
		const corporation = new Corporation(keyed.context, CORP_B_ID)

		expect(await corporation.get('memberLimit')).toBe(1000)
		expect(await corporation.get('ticker')).toBe('SOLEN')
		expect(keyed.api.callsTo('corp/CorporationSheet')).toHaveLength(1)

		await new Corporation(anonymous.context, CORP_B_ID).resolve()
		await new Corporation(keyed.context, CORP_B_ID).resolve()
		expect(anonymous.api.callsTo('corp/CorporationSheet')).toHaveLength(1)
		expect(keyed.api.callsTo('corp/CorporationSheet')).toHaveLength(1)
	})

	it('should use a public snapshot for a key that does not cover the corporation', async () => {
		const cache = new EntityCache()
		const anonymous = createContext(routes(), { cache })
		await new Corporation(anonymous.context, CORP_A_ID).resolve()

		const keyed = createContext(routes(), { cache, withCredential: true })
		await new Corporation(keyed.context, CORP_A_ID).resolve()

		expect(keyed.api.calls.map((call) => call.endpoint)).toEqual(['account/APIKeyInfo'])
	})

	it('should never cache membership dates', async () => {
		const { context } = createContext(routes())
		const joined = new Date('2021-06-01T00:00:00Z')
		const employer = new Corporation(context, CORP_A_ID, {}, { startDate: joined })
		await employer.resolve()

		const plain = new Corporation(context, CORP_A_ID)
		await plain.resolve()

		expect(employer.startDate).toBe(joined)
		expect(plain.startDate).toBeUndefined()
		expect(context.cache.corporations.get(CORP_A_ID)).not.toHaveProperty('startDate')
	})

	it('should report its membership dates without a remote call', () => {
		const { api, context } = createContext({
			'corp/CorporationSheet': { status: 503, statusText: 'Service Unavailable', body: '' },
		})
		const joined = new Date('2021-06-01T00:00:00Z')
		const current = new Corporation(context, CORP_B_ID, {}, { startDate: joined })

		expect(current.startDate).toBe(joined)
		expect(current.endDate).toBeUndefined()
		expect(current.status).toBe('unresolved')
		expect(api.calls).toHaveLength(0)
	})

	it('should hand out its alliance unresolved', async () => {
		const { api, context } = createContext(routes())

		const alliance = await new Corporation(context, CORP_A_ID).alliance()

		expect(alliance?.peek('allianceId')).toBe(ALLIANCE_ID)
		expect(alliance?.peek('name')).toBe('Example Alliance')
		expect(alliance?.status).toBe('unresolved')
		expect(api.callsTo('eve/AllianceList')).toHaveLength(0)
	})

	it('should report freshness from cachedUntil', async () => {
		const { context } = createContext(routes())
		const corporation = new Corporation(context, CORP_A_ID)

		expect(corporation.isCached(new Date('2029-01-01T00:00:00Z'))).toBe(false)
		await corporation.resolve()
		expect(corporation.isCached(new Date('2029-01-01T00:00:00Z'))).toBe(true)
		expect(corporation.isCached(new Date('2031-01-01T00:00:00Z'))).toBe(false)
	})
})
