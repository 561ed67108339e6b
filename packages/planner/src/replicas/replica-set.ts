/**
 * Replica set
 *
 * Ordered broker ids hosting one partition, leader first. Never mutated: every
 * edit returns a new ReplicaSet.
 */

import { InvalidReplicaSetError } from '../errors.js'
import { isBrokerId, type BrokerId } from '../pool/broker-pool.js'

export class ReplicaSet {
	readonly brokers: readonly BrokerId[]

	private constructor(brokers: readonly BrokerId[]) {
		this.brokers = Object.freeze([...brokers])
	}

	/**
	 * @throws InvalidReplicaSetError when empty, duplicated or holding invalid ids
	 */
	static of(brokers: readonly number[]): ReplicaSet {
		if (brokers.length === 0) {
			throw new InvalidReplicaSetError(brokers, 'no replicas')
		}
		const seen = new Set<number>()
		for (const id of brokers) {
			if (!isBrokerId(id)) {
				throw new InvalidReplicaSetError(brokers, `${id} is not a valid broker id`)
			}
			if (seen.has(id)) {
				throw new InvalidReplicaSetError(brokers, `broker ${id} appears more than once`)
			}
			seen.add(id)
		}
		return new ReplicaSet(brokers)
	}

	/**
	 * Build from metadata, moving the reported leader to position 0
	 *
	 * Order is kept as reported when there is no leader or the leader is not
	 * one of the replicas.
	 */
	static fromMetadata(replicas: readonly number[], leader: number | null): ReplicaSet {
		const set = ReplicaSet.of(replicas)
		if (leader === null) {
			return set
		}
		const index = set.indexOf(leader)
		if (index <= 0) {
			return set
		}
		return new ReplicaSet([leader, ...set.brokers.filter(id => id !== leader)])
	}

	get leader(): BrokerId {
		return this.brokers[0]!
	}

	get followers(): readonly BrokerId[] {
		return this.brokers.slice(1)
	}

	get size(): number {
		return this.brokers.length
	}

	has(id: BrokerId): boolean {
		return this.brokers.includes(id)
	}

	indexOf(id: BrokerId): number {
		return this.brokers.indexOf(id)
	}

	/**
	 * Replace the broker at `index`, keeping every other position
	 */
	replaceAt(index: number, id: BrokerId): ReplicaSet {
		const next = [...this.brokers]
		next[index] = id
		return ReplicaSet.of(next)
	}

	append(ids: readonly BrokerId[]): ReplicaSet {
		return ReplicaSet.of([...this.brokers, ...ids])
	}

	equals(other: ReplicaSet): boolean {
		return this.size === other.size && this.brokers.every((id, i) => other.brokers[i] === id)
	}

	toArray(): BrokerId[] {
		return [...this.brokers]
	}

	toString(): string {
		return `[${this.brokers.join(',')}]`
	}
}
