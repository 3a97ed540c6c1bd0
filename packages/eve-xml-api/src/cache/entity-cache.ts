import { CollectionCache } from './collection-cache'
import { IdentityTable } from './identity-cache'
import { OnceCache } from './once-cache'

import type { CredentialScope } from '../credential'
import type {
	AllianceFields,
	AllianceRecord,
	CertificateFields,
	CertificateRecord,
	CharacterFields,
	CorporationFields,
	SkillFields,
	SkillTreeRecord,
} from '../types'

/**
 * Every cache the entities share: one identity table per entity kind, the
 * lookup-table collections, and resolved credential scopes.
 *
 * Tables are built on first use. Pass one instance to every entity of a
 * session; tests create a fresh one per case.
 */
export class EntityCache {
	private characterTable?: IdentityTable<CharacterFields>
	private corporationTable?: IdentityTable<CorporationFields>
	private allianceTable?: IdentityTable<AllianceFields>
	private skillTable?: IdentityTable<SkillFields>
	private certificateTable?: IdentityTable<CertificateFields>

	private allianceCollection?: CollectionCache<AllianceRecord>
	private skillCollection?: CollectionCache<SkillTreeRecord>
	private certificateCollection?: CollectionCache<CertificateRecord>

	/** Credential scopes keyed by `keyId/vCode` */
	readonly credentials = new OnceCache<CredentialScope>()

	get characters(): IdentityTable<CharacterFields> {
		return (this.characterTable ??= new IdentityTable<CharacterFields>('character'))
	}

	get corporations(): IdentityTable<CorporationFields> {
		return (this.corporationTable ??= new IdentityTable<CorporationFields>('corporation'))
	}

	get alliances(): IdentityTable<AllianceFields> {
		return (this.allianceTable ??= new IdentityTable<AllianceFields>('alliance'))
	}

	get skills(): IdentityTable<SkillFields> {
		return (this.skillTable ??= new IdentityTable<SkillFields>('skill'))
	}

	get certificates(): IdentityTable<CertificateFields> {
		return (this.certificateTable ??= new IdentityTable<CertificateFields>('certificate'))
	}

	get allianceList(): CollectionCache<AllianceRecord> {
		return (this.allianceCollection ??= new CollectionCache<AllianceRecord>('alliance'))
	}

	get skillTree(): CollectionCache<SkillTreeRecord> {
		return (this.skillCollection ??= new CollectionCache<SkillTreeRecord>('skill'))
	}

	get certificateTree(): CollectionCache<CertificateRecord> {
		return (this.certificateCollection ??= new CollectionCache<CertificateRecord>('certificate'))
	}

	/**
	 * Drop every table and collection
	 */
	clear(): void {
		this.characterTable = undefined
		this.corporationTable = undefined
		this.allianceTable = undefined
		this.skillTable = undefined
		this.certificateTable = undefined
		this.allianceCollection = undefined
		this.skillCollection = undefined
		this.certificateCollection = undefined
		this.credentials.clear()
	}
}

let shared: EntityCache | undefined

/**
 * The process-wide cache used when a session is created without one
 */
export function sharedEntityCache(): EntityCache {
	return (shared ??= new EntityCache())
}
