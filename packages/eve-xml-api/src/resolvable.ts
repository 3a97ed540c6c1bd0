import { FieldAlreadySetError } from './errors'

/**
 * Produces every field the remote side knows for a record. Receives the fields
 * already set, so it can skip work or use them as lookup hints.
 */
export type Resolver<F extends object> = (current: Readonly<Partial<F>>) => Promise<Partial<F>>

export type ResolutionState = 'unresolved' | 'resolving' | 'resolved'

function sameValue(a: unknown, b: unknown): boolean {
	if (a instanceof Date && b instanceof Date) {
		return a.getTime() === b.getTime()
	}
	return Object.is(a, b)
}

/**
 * A set of write-once fields that fills itself from a remote source on
 * first demand.
 *
 * Reading a field that is not set triggers one resolution pass, which fills
 * every field it can at once. After a pass completes (found or not) reads are
 * local, including reads of fields that stayed absent. Concurrent readers
 * share the pass in progress. A pass that throws writes nothing and leaves the
 * record unresolved, so the next read tries again.
 *
 * @example
 * ```ts
 * const record = new Resolvable<SkillFields>(async () => lookupSkill(3300), { skillId })
 *
 * await record.get('name') // one remote call
 * await record.get('rank') // no remote call
 * ```
 */
export class Resolvable<F extends object> {
	private readonly fields: Partial<F> = {}
	private state: ResolutionState = 'unresolved'
	private inFlight?: Promise<void>

	constructor(
		private readonly resolver: Resolver<F>,
		preset: Partial<F> = {}
	) {
		for (const key in preset) {
			const value = preset[key]
			if (value !== undefined) {
				this.fields[key] = value
			}
		}
	}

	get status(): ResolutionState {
		return this.state
	}

	get isResolved(): boolean {
		return this.state === 'resolved'
	}

	/**
	 * Whether the field is set, without resolving
	 */
	has<K extends keyof F>(key: K): boolean {
		return this.fields[key] !== undefined
	}

	/**
	 * Read a field without resolving
	 */
	peek<K extends keyof F>(key: K): F[K] | undefined {
		return this.fields[key]
	}

	/**
	 * Read a field, resolving the record first if the field is not set and no
	 * pass has completed yet
	 */
	async get<K extends keyof F>(key: K): Promise<F[K] | undefined> {
		if (this.fields[key] === undefined && this.state !== 'resolved') {
			await this.resolve()
		}
		return this.fields[key]
	}

	/**
	 * Set a field that is not set yet. Setting the value it already has is a
	 * no-op.
	 *
	 * @throws FieldAlreadySetError when the field holds a different value
	 */
	set<K extends keyof F>(key: K, value: F[K]): void {
		const current = this.fields[key]
		if (current !== undefined) {
			if (sameValue(current, value)) {
				return
			}
			throw new FieldAlreadySetError(String(key))
		}
		this.fields[key] = value
	}

	/**
	 * Run the resolution pass unless one has completed
	 */
	resolve(): Promise<void> {
		if (this.state === 'resolved') {
			return Promise.resolve()
		}

		if (!this.inFlight) {
			this.state = 'resolving'
			this.inFlight = this.run().finally(() => {
				this.inFlight = undefined
			})
		}

		return this.inFlight
	}

	/**
	 * Copy of the fields set so far
	 */
	snapshot(): Readonly<Partial<F>> {
		return { ...this.fields }
	}

	private async run(): Promise<void> {
		let resolved: Partial<F>
		try {
			resolved = await this.resolver(this.snapshot())
		} catch (error) {
			this.state = 'unresolved'
			throw error
		}

		for (const key in resolved) {
			const value = resolved[key]
			if (value !== undefined && this.fields[key] === undefined) {
				this.fields[key] = value
			}
		}
		this.state = 'resolved'
	}
}
