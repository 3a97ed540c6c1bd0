/**
 * Keyed cache whose values are loaded at most once.
 *
 * Concurrent callers asking for the same key share one in-flight load. A load
 * that fails stores nothing, so the next caller tries again.
 *
 * @example
 * ```ts
 * const scopes = new OnceCache<CredentialScope>()
 *
 * const scope = await scopes.getOrLoad('1234/test-secret', () => fetchScope())
 * ```
 */
export class OnceCache<T> {
	private readonly values = new Map<string, T>()
	private readonly inFlight = new Map<string, Promise<T>>()

	/**
	 * Get a loaded value, or load it
	 */
	getOrLoad(key: string, load: () => Promise<T>): Promise<T> {
		const value = this.values.get(key)
		if (value !== undefined) {
			return Promise.resolve(value)
		}

		const existing = this.inFlight.get(key)
		if (existing) {
			return existing
		}

		const pending = load()
			.then((value) => {
				this.values.set(key, value)
				return value
			})
			.finally(() => {
				this.inFlight.delete(key)
			})

		this.inFlight.set(key, pending)
		return pending
	}

	/**
	 * Get a loaded value without loading
	 */
	peek(key: string): T | undefined {
		return this.values.get(key)
	}

	has(key: string): boolean {
		return this.values.has(key)
	}

	isLoading(key: string): boolean {
		return this.inFlight.has(key)
	}

	delete(key: string): boolean {
		return this.values.delete(key)
	}

	clear(): void {
		this.values.clear()
	}

	get size(): number {
		return this.values.size
	}
}
