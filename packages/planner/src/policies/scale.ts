/**
 * Scale policy
 *
 * Grows or shrinks the replication factor of a partition.
 *
 * - Scale up keeps every current replica in place and appends brokers drawn
 *   from the pool.
 * - Scale down keeps the leader and a random subset of the followers, so that
 *   repeated scale-downs do not always drop the same brokers.
 * - A target of 0 asks for the topic to be deleted instead of reassigned.
 */

import { NoCandidateError, OutOfRangeError } from '../errors.js'
import type { BrokerPool } from '../pool/broker-pool.js'
import { ReplicaSet } from '../replicas/replica-set.js'
import { CandidateSelector } from '../selector.js'
import { defaultRandom, shuffle, type RandomSource } from '../utils/random.js'
import type { PlannedPartition, PolicyOutcome, ReassignmentPolicy } from './types.js'

export interface ScalePolicyConfig {
	targetReplication: number
	pool: BrokerPool
	random?: RandomSource
}

export class ScalePolicy implements ReassignmentPolicy {
	readonly name = 'scale'
	readonly targetReplication: number
	readonly pool: BrokerPool
	private readonly random: RandomSource
	private readonly selector: CandidateSelector

	constructor(config: ScalePolicyConfig) {
		this.targetReplication = config.targetReplication
		this.pool = config.pool
		this.random = config.random ?? defaultRandom
		this.selector = new CandidateSelector(this.random)
	}

	validate(): void {
		// Out-of-range targets are reported per partition
	}

	apply(partition: PlannedPartition): PolicyOutcome {
		const { replicas } = partition
		const target = this.targetReplication

		if (target === 0) {
			return { type: 'delete-topic' }
		}

		if (!Number.isSafeInteger(target) || target < 0) {
			return {
				type: 'error',
				replicas,
				error: new OutOfRangeError(partition.topic, partition.partition, target),
			}
		}

		if (target === replicas.size) {
			return { type: 'unchanged', replicas }
		}

		if (target > replicas.size) {
			return this.scaleUp(partition, target)
		}

		return { type: 'reassign', replicas: this.scaleDown(replicas, target) }
	}

	private scaleUp(partition: PlannedPartition, target: number): PolicyOutcome {
		const { replicas } = partition
		try {
			const added = this.selector.pickMany(this.pool, replicas.brokers, target - replicas.size, partition)
			return { type: 'reassign', replicas: replicas.append(added) }
		} catch (error) {
			if (error instanceof NoCandidateError) {
				return { type: 'error', replicas, error }
			}
			throw error
		}
	}

	private scaleDown(replicas: ReplicaSet, target: number): ReplicaSet {
		const kept = shuffle(replicas.followers, this.random).slice(0, target - 1)
		return ReplicaSet.of([replicas.leader, ...kept])
	}
}
