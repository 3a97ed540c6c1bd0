import { vi } from 'vitest'

import { EntityCache } from '../src/cache/entity-cache'
import { loadConfig } from '../src/config'
import { Credential } from '../src/credential'
import { EndpointDispatcher } from '../src/dispatcher'

import type { HttpRequestOptions, HttpResponse } from '../src/transport'
import type { ApiContext } from '../src/types'

export const TEST_BASE_URL = 'https://api.test'
export const KEY_ID = 1234567
export const V_CODE = 'test-secret'

export const CHARACTER_ID = 90000001
export const OTHER_CHARACTER_ID = 90000002
export const CORP_A_ID = 98000001
export const CORP_B_ID = 98000002
export const ALLIANCE_ID = 99000001

export interface RecordedCall {
	endpoint: string
	url: string
	query: Record<string, string>
}

export type Route = string | HttpResponse | ((call: RecordedCall) => string | HttpResponse)

/**
 * In-process stand-in for the API, answering by endpoint name
 */
export function createFakeApi(routes: Record<string, Route> = {}) {
	const calls: RecordedCall[] = []

	const transport = vi.fn(
		async (url: string, _options: HttpRequestOptions): Promise<HttpResponse> => {
			const parsed = new URL(url)
			const endpoint = parsed.pathname.replace(/^\//, '').replace(/\.xml\.aspx$/, '')
			const call: RecordedCall = {
				endpoint,
				url,
				query: Object.fromEntries(parsed.searchParams.entries()),
			}
			calls.push(call)

			const route = routes[endpoint]
			if (route === undefined) {
				return { status: 404, statusText: 'Not Found', body: '' }
			}
			const answer = typeof route === 'function' ? route(call) : route
			return typeof answer === 'string' ? { status: 200, statusText: 'OK', body: answer } : answer
		}
	)

	return {
		transport,
		calls,
		callsTo: (endpoint: string) => calls.filter((call) => call.endpoint === endpoint),
	}
}

export type FakeApi = ReturnType<typeof createFakeApi>

export function createDispatcher(api: FakeApi): EndpointDispatcher {
	return new EndpointDispatcher({
		config: loadConfig({ baseUrl: TEST_BASE_URL }, {}),
		transport: api.transport,
	})
}

export function createContext(
	routes: Record<string, Route> = {},
	options: { withCredential?: boolean; cache?: EntityCache } = {}
): { api: FakeApi; context: ApiContext; credential?: Credential } {
	const api = createFakeApi(routes)
	const dispatcher = createDispatcher(api)
	const cache = options.cache ?? new EntityCache()
	const credential = options.withCredential
		? new Credential(KEY_ID, V_CODE, dispatcher, cache)
		: undefined

	return { api, context: { dispatcher, cache, credential }, credential }
}

// ========== Documents ==========

export function apiDocument(result: string, cachedUntil = '2030-01-01 00:00:00'): string {
	return `<?xml version="1.0" encoding="UTF-8"?>
<eveapi version="2">
	<currentTime>2026-01-01 00:00:00</currentTime>
	<result>${result}</result>
	<cachedUntil>${cachedUntil}</cachedUntil>
</eveapi>`
}

export function errorDocument(code: number, message: string): string {
	return `<?xml version="1.0" encoding="UTF-8"?>
<eveapi version="2">
	<currentTime>2026-01-01 00:00:00</currentTime>
	<error code="${code}">${message}</error>
	<cachedUntil>2026-01-01 00:00:00</cachedUntil>
</eveapi>`
}

export function keyInfoDocument(
	type: 'Account' | 'Character' | 'Corporation',
	characters: Array<{ id: number; name: string; corporationId: number; corporationName: string }>,
	expires = ''
): string {
	const rows = characters
		.map(
			(c) =>
				`<row characterID="${c.id}" characterName="${c.name}" corporationID="${c.corporationId}" corporationName="${c.corporationName}" allianceID="${ALLIANCE_ID}" allianceName="Example Alliance" factionID="0" factionName="" />`
		)
		.join('')
	return apiDocument(
		`<key accessMask="268435455" type="${type}" expires="${expires}"><rowset name="characters" key="characterID" columns="characterID,characterName,corporationID,corporationName,allianceID,allianceName,factionID,factionName">${rows}</rowset></key>`
	)
}

export const PILOT = {
	id: CHARACTER_ID,
	name: 'Kira Solen',
	corporationId: CORP_B_ID,
	corporationName: 'Deep Core Mining',
}

export function characterInfoDocument(options: { authenticated?: boolean } = {}): string {
	const privateFields = options.authenticated
		? '<accountBalance>1500.25</accountBalance><skillPoints>2500000</skillPoints>'
		: ''
	return apiDocument(`
		<characterID>${CHARACTER_ID}</characterID>
		<characterName>Kira Solen</characterName>
		<race>Caldari</race>
		<bloodline>Deteis</bloodline>
		<ancestry>Merchandisers</ancestry>
		${privateFields}
		<corporationID>${CORP_B_ID}</corporationID>
		<corporation>Deep Core Mining</corporation>
		<corporationDate>2021-06-01 00:00:00</corporationDate>
		<allianceID>${ALLIANCE_ID}</allianceID>
		<alliance>Example Alliance</alliance>
		<allianceDate>2022-01-01 00:00:00</allianceDate>
		<securityStatus>1.5</securityStatus>
		<rowset name="employmentHistory" key="recordID" columns="recordID,corporationID,corporationName,startDate">
			<row recordID="11" corporationID="${CORP_A_ID}" corporationName="Solen Industries" startDate="2020-01-10 00:00:00" />
			<row recordID="12" corporationID="${CORP_B_ID}" corporationName="Deep Core Mining" startDate="2021-06-01 00:00:00" />
		</rowset>`)
}

export function characterSheetDocument(): string {
	return apiDocument(`
		<characterID>${CHARACTER_ID}</characterID>
		<name>Kira Solen</name>
		<DoB>2019-05-04 12:30:00</DoB>
		<race>Caldari</race>
		<bloodLine>Deteis</bloodLine>
		<ancestry>Merchandisers</ancestry>
		<gender>Female</gender>
		<corporationName>Deep Core Mining</corporationName>
		<corporationID>${CORP_B_ID}</corporationID>
		<allianceName>Example Alliance</allianceName>
		<allianceID>${ALLIANCE_ID}</allianceID>
		<cloneName>Clone Grade Alpha</cloneName>
		<balance>1500.25</balance>
		<rowset name="skills" key="typeID" columns="typeID,skillpoints,level,published">
			<row typeID="3300" skillpoints="256000" level="5" published="1" />
			<row typeID="3319" skillpoints="8000" level="2" published="1" />
		</rowset>
		<rowset name="certificates" key="certificateID" columns="certificateID">
			<row certificateID="5" />
		</rowset>`)
}

export function skillQueueDocument(): string {
	return apiDocument(`
		<rowset name="skillqueue" key="queuePosition" columns="queuePosition,typeID,level,startSP,endSP,startTime,endTime">
			<row queuePosition="1" typeID="3319" level="4" startSP="45255" endSP="256000" startTime="" endTime="" />
			<row queuePosition="0" typeID="3319" level="3" startSP="8000" endSP="45255" startTime="2026-01-01 00:00:00" endTime="2026-01-02 06:00:00" />
		</rowset>`)
}

export function corporationSheetDocument(
	corporationId = CORP_A_ID,
	options: { authenticated?: boolean } = {}
): string {
	const privateFields = options.authenticated ? '<memberLimit>1000</memberLimit>' : ''
	return apiDocument(`
		<corporationID>${corporationId}</corporationID>
		<corporationName>Solen Industries</corporationName>
		<ticker>SOLEN</ticker>
		<ceoID>${OTHER_CHARACTER_ID}</ceoID>
		<ceoName>Rho Arden</ceoName>
		<stationID>60003760</stationID>
		<stationName>Jita IV - Moon 4</stationName>
		<description>Mining and industry.</description>
		<url>https://corp.example</url>
		<allianceID>${ALLIANCE_ID}</allianceID>
		<allianceName>Example Alliance</allianceName>
		<taxRate>10</taxRate>
		<memberCount>42</memberCount>
		${privateFields}
		<shares>1000</shares>`)
}

export function skillTreeDocument(): string {
	return apiDocument(`
		<rowset name="skillGroups" key="groupID" columns="groupName,groupID">
			<row groupName="Gunnery" groupID="255">
				<rowset name="skills" key="typeID" columns="typeName,groupID,typeID,published">
					<row typeName="Gunnery" groupID="255" typeID="3300" published="1">
						<description>Basic turret operation skill.</description>
						<rank>1</rank>
					</row>
					<row typeName="Small Hybrid Turret" groupID="255" typeID="3301" published="1">
						<description>Operation of small hybrid turrets.</description>
						<rank>1</rank>
					</row>
				</rowset>
			</row>
			<row groupName="Missiles" groupID="256">
				<rowset name="skills" key="typeID" columns="typeName,groupID,typeID,published">
					<row typeName="Missile Launcher Operation" groupID="256" typeID="3319" published="1">
						<description>Basic missile launcher operation.</description>
						<rank>1</rank>
					</row>
					<row typeName="GUNNERY" groupID="256" typeID="3399" published="0">
						<description>Unpublished duplicate.</description>
						<rank>3</rank>
					</row>
				</rowset>
			</row>
		</rowset>`)
}

export function certificateTreeDocument(): string {
	return apiDocument(`
		<rowset name="categories" key="categoryID" columns="categoryID,categoryName">
			<row categoryID="3" categoryName="Core">
				<rowset name="classes" key="classID" columns="classID,className">
					<row classID="2" className="Core Competency">
						<rowset name="certificates" key="certificateID" columns="certificateID,grade,corporationID,description">
							<row certificateID="5" grade="1" corporationID="1000125" description="Basic core competency." />
							<row certificateID="6" grade="2" corporationID="1000125" description="Standard core competency." />
						</rowset>
					</row>
				</rowset>
			</row>
		</rowset>`)
}

export function allianceListDocument(): string {
	return apiDocument(`
		<rowset name="alliances" key="allianceID" columns="name,shortName,allianceID,executorCorpID,memberCount,startDate">
			<row name="Example Alliance" shortName="EXA" allianceID="${ALLIANCE_ID}" executorCorpID="${CORP_A_ID}" memberCount="120" startDate="2015-03-01 12:00:00">
				<rowset name="memberCorporations" key="corporationID" columns="corporationID,startDate">
					<row corporationID="${CORP_A_ID}" startDate="2015-03-01 12:00:00" />
					<row corporationID="${CORP_B_ID}" startDate="2022-01-01 00:00:00" />
				</rowset>
			</row>
			<row name="Other Alliance" shortName="OTHR" allianceID="99000002" executorCorpID="98000003" memberCount="5" startDate="2018-07-15 00:00:00">
				<rowset name="memberCorporations" key="corporationID" columns="corporationID,startDate">
					<row corporationID="98000003" startDate="2018-07-15 00:00:00" />
				</rowset>
			</row>
		</rowset>`)
}
