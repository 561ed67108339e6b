/**
 * Candidate selector
 *
 * Chooses the broker that fills a replica slot. Random mode draws uniformly over
 * every eligible broker on each call; explicit mode only checks that the
 * operator's broker is not already in the replica list.
 */

import { InvalidExplicitTargetError, NoCandidateError } from './errors.js'
import type { BrokerId, BrokerPool } from './pool/broker-pool.js'
import { defaultRandom, randomIndex, type RandomSource } from './utils/random.js'
import type { TopicPartition } from './utils/topic-partition.js'

export class CandidateSelector {
	private readonly random: RandomSource

	constructor(random: RandomSource = defaultRandom) {
		this.random = random
	}

	/**
	 * Draw one broker from the pool that is not in `alreadyUsed`
	 *
	 * @throws NoCandidateError when the pool has nothing left
	 */
	pick(pool: BrokerPool, alreadyUsed: Iterable<BrokerId>, target: TopicPartition): BrokerId {
		const used = [...alreadyUsed]
		const available = pool.count(used)
		const picked = available > 0 ? pool.at(randomIndex(available, this.random), used) : undefined
		if (picked === undefined) {
			throw new NoCandidateError(target.topic, target.partition, 1, 0)
		}
		return picked
	}

	/**
	 * Draw `count` distinct brokers, each one excluded from the following draws
	 *
	 * @throws NoCandidateError reporting how many brokers were available
	 */
	pickMany(pool: BrokerPool, alreadyUsed: Iterable<BrokerId>, count: number, target: TopicPartition): BrokerId[] {
		const used = new Set(alreadyUsed)
		const picked: BrokerId[] = []
		while (picked.length < count) {
			let id: BrokerId
			try {
				id = this.pick(pool, used, target)
			} catch (error) {
				if (error instanceof NoCandidateError) {
					throw new NoCandidateError(target.topic, target.partition, count, picked.length)
				}
				throw error
			}
			used.add(id)
			picked.push(id)
		}
		return picked
	}

	/**
	 * Use the operator's replacement broker
	 *
	 * @throws InvalidExplicitTargetError when it is already in `alreadyUsed`
	 */
	pickExplicit(id: BrokerId, alreadyUsed: Iterable<BrokerId>, target?: TopicPartition): BrokerId {
		for (const used of alreadyUsed) {
			if (used === id) {
				throw new InvalidExplicitTargetError(id, target?.topic, target?.partition)
			}
		}
		return id
	}
}
