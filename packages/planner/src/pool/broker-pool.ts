/**
 * Broker pool
 *
 * The brokers replicas may be drawn from: an inclusive id range or an explicit
 * id set, minus the operator's exclusion list. Immutable once built.
 */

import { ConfigurationError, EmptyPoolError } from '../errors.js'

export type BrokerId = number

export function isBrokerId(value: unknown): value is BrokerId {
	return typeof value === 'number' && Number.isSafeInteger(value) && value >= 0
}

function assertBrokerIds(ids: Iterable<number>, label: string): void {
	for (const id of ids) {
		if (!isBrokerId(id)) {
			throw new ConfigurationError(`Invalid broker id in ${label}`, [`${id} is not a non-negative integer`])
		}
	}
}

type PoolRange = { readonly lowId: BrokerId; readonly highId: BrokerId }

export class BrokerPool {
	/** Ascending pool members before exclusions; empty for range pools */
	private readonly members: readonly BrokerId[]
	private readonly memberSet: ReadonlySet<BrokerId>
	readonly excluded: ReadonlySet<BrokerId>

	/** Set when the pool was built from a range, whose members are never materialized */
	readonly range: PoolRange | null

	private constructor(members: readonly BrokerId[], excluded: Iterable<BrokerId>, range: PoolRange | null) {
		this.members = members
		this.memberSet = new Set(members)
		this.excluded = new Set(excluded)
		this.range = range
	}

	/**
	 * Pool over the inclusive range [lowId, highId]
	 */
	static range(lowId: BrokerId, highId: BrokerId, excluded: Iterable<BrokerId> = []): BrokerPool {
		assertBrokerIds([lowId, highId], 'broker range')
		assertBrokerIds(excluded, 'exclusion list')
		if (lowId > highId) {
			throw new ConfigurationError('Invalid broker range', [`first broker id ${lowId} > last broker id ${highId}`])
		}
		return new BrokerPool([], excluded, { lowId, highId })
	}

	/**
	 * Pool over an explicit set of broker ids
	 */
	static of(ids: Iterable<BrokerId>, excluded: Iterable<BrokerId> = []): BrokerPool {
		const unique = [...new Set(ids)]
		assertBrokerIds(unique, 'broker list')
		assertBrokerIds(excluded, 'exclusion list')
		if (unique.length === 0) {
			throw new ConfigurationError('Broker list is empty')
		}
		return new BrokerPool(
			unique.sort((a, b) => a - b),
			excluded,
			null
		)
	}

	private isMember(id: BrokerId): boolean {
		if (this.range) {
			return id >= this.range.lowId && id <= this.range.highId
		}
		return this.memberSet.has(id)
	}

	private get memberCount(): number {
		return this.range ? this.range.highId - this.range.lowId + 1 : this.members.length
	}

	/**
	 * Members removed by the exclusion list or `exclude`, ascending
	 */
	private removed(exclude: Iterable<BrokerId>): BrokerId[] {
		const ids = new Set(this.excluded)
		for (const id of exclude) {
			ids.add(id)
		}
		return [...ids].filter(id => this.isMember(id)).sort((a, b) => a - b)
	}

	/**
	 * Whether the broker is a member of the pool and not excluded
	 */
	contains(id: BrokerId): boolean {
		return this.isMember(id) && !this.excluded.has(id)
	}

	/**
	 * Number of selectable brokers with no extra exclusions
	 */
	get size(): number {
		return this.count()
	}

	/**
	 * Number of selectable brokers not in `exclude`
	 */
	count(exclude: Iterable<BrokerId> = []): number {
		return this.memberCount - this.removed(exclude).length
	}

	/**
	 * The `index`-th selectable broker not in `exclude`, in ascending order
	 *
	 * Range pools step past the removed ids instead of listing the range.
	 *
	 * @returns undefined when `index` is outside [0, count(exclude))
	 */
	at(index: number, exclude: Iterable<BrokerId> = []): BrokerId | undefined {
		const removed = this.removed(exclude)
		if (!Number.isSafeInteger(index) || index < 0 || index >= this.memberCount - removed.length) {
			return undefined
		}
		if (!this.range) {
			const skip = new Set(removed)
			return this.members.filter(id => !skip.has(id))[index]
		}
		let id = this.range.lowId + index
		for (const removedId of removed) {
			if (removedId > id) {
				break
			}
			id++
		}
		return id
	}

	/**
	 * Selectable brokers not in `exclude`, ascending
	 *
	 * Lists every member; use count() and at() to draw from large ranges.
	 *
	 * @throws EmptyPoolError when nothing is left
	 */
	candidates(exclude: Iterable<BrokerId> = []): BrokerId[] {
		const skip = [...new Set(exclude)]
		const removed = new Set(this.removed(skip))
		const result: BrokerId[] = []
		if (this.range) {
			for (let id = this.range.lowId; id <= this.range.highId; id++) {
				if (!removed.has(id)) {
					result.push(id)
				}
			}
		} else {
			result.push(...this.members.filter(id => !removed.has(id)))
		}
		if (result.length === 0) {
			throw new EmptyPoolError(skip.sort((a, b) => a - b))
		}
		return result
	}

	toString(): string {
		const base = this.range ? `[${this.range.lowId}..${this.range.highId}]` : `{${this.members.join(',')}}`
		if (this.excluded.size === 0) {
			return base
		}
		return `${base} \\ {${[...this.excluded].sort((a, b) => a - b).join(',')}}`
	}
}
