import { createEveCertificateId, parseEveId } from '@eve-xml/eve-types'

import { toInteger } from '../fields'
import { Resolvable } from '../resolvable'

import type { CollectionSnapshot } from '../cache/collection-cache'
import type { ResolutionState } from '../resolvable'
import type { ApiContext, CertificateFields, CertificateRecord } from '../types'

/**
 * Fetch `eve/CertificateTree` unless this context's cache already holds it
 */
export function loadCertificateTree(
	context: ApiContext
): Promise<ReadonlyMap<number, CertificateRecord>> {
	return context.cache.certificateTree.load(
		async (): Promise<CollectionSnapshot<CertificateRecord>> => {
			const document = await context.dispatcher.call('eve/CertificateTree', {}, context.credential)
			const records = new Map<number, CertificateRecord>()

			for (const category of document.allNodes('result/rowset[@name=categories]/row')) {
				const categoryId = toInteger(category.attribute('categoryID'))
				const categoryName = category.attribute('categoryName')

				for (const certificateClass of category.allNodes('rowset[@name=classes]/row')) {
					const classId = toInteger(certificateClass.attribute('classID'))
					const className = certificateClass.attribute('className')

					for (const row of certificateClass.allNodes('rowset[@name=certificates]/row')) {
						const certificateId = parseEveId(row.attribute('certificateID'), createEveCertificateId)
						if (certificateId === undefined) {
							continue
						}
						records.set(certificateId, {
							certificateId,
							description: row.attribute('description'),
							grade: toInteger(row.attribute('grade')),
							categoryId,
							categoryName,
							classId,
							className,
						})
					}
				}
			}

			return { records, cachedUntil: document.cachedUntil }
		}
	)
}

/**
 * A certificate from the certificate tree, looked up by id
 */
export class Certificate {
	private readonly record: Resolvable<CertificateFields>

	constructor(
		private readonly context: ApiContext,
		readonly certificateId: number,
		preset: Partial<CertificateFields> = {}
	) {
		this.record = new Resolvable<CertificateFields>(() => this.resolveFields(), {
			...preset,
			certificateId: createEveCertificateId(certificateId),
		})
	}

	get status(): ResolutionState {
		return this.record.status
	}

	get<K extends keyof CertificateFields>(key: K): Promise<CertificateFields[K] | undefined> {
		return this.record.get(key)
	}

	peek<K extends keyof CertificateFields>(key: K): CertificateFields[K] | undefined {
		return this.record.peek(key)
	}

	set<K extends keyof CertificateFields>(key: K, value: CertificateFields[K]): void {
		this.record.set(key, value)
	}

	resolve(): Promise<void> {
		return this.record.resolve()
	}

	snapshot(): Readonly<Partial<CertificateFields>> {
		return this.record.snapshot()
	}

	private async resolveFields(): Promise<Partial<CertificateFields>> {
		const { cache } = this.context

		const cached = cache.certificates.get(this.certificateId)
		if (cached) {
			return cached
		}

		await loadCertificateTree(this.context)

		const found = cache.certificateTree.findById(this.certificateId)
		if (!found) {
			return {}
		}

		return cache.certificates.put(found.certificateId, found, {
			cachedUntil: cache.certificateTree.cachedUntil,
		})
	}
}
