/**
 * Decommission policy
 *
 * Replaces one broker in every replica list that contains it. The replacement
 * takes the position the broker held, so decommissioning a leader designates
 * its replacement as the new preferred leader.
 *
 * Any partition that cannot be completed aborts the run.
 */

import { ConfigurationError, InvalidExplicitTargetError, NoCandidateError, NoReplacementFoundError } from '../errors.js'
import type { BrokerId, BrokerPool } from '../pool/broker-pool.js'
import { CandidateSelector } from '../selector.js'
import { defaultRandom, type RandomSource } from '../utils/random.js'
import type { PlannedPartition, PolicyOutcome, ReassignmentPolicy } from './types.js'

/**
 * Where replacement brokers come from
 * - 'random': drawn from the pool, which carries the operator exclusion list
 * - 'explicit': always the given broker
 */
export type ReplacementTarget =
	| { mode: 'random'; pool: BrokerPool }
	| { mode: 'explicit'; replacement: BrokerId; excluded?: readonly BrokerId[] }

export interface DecommissionPolicyConfig {
	/** Broker being evacuated */
	brokerId: BrokerId
	target: ReplacementTarget
	/** Only touch partitions the broker currently leads */
	leaderOnly?: boolean
	random?: RandomSource
}

export class DecommissionPolicy implements ReassignmentPolicy {
	readonly name = 'decommission'
	readonly brokerId: BrokerId
	readonly target: ReplacementTarget
	readonly leaderOnly: boolean
	private readonly selector: CandidateSelector

	constructor(config: DecommissionPolicyConfig) {
		this.brokerId = config.brokerId
		this.target = config.target
		this.leaderOnly = config.leaderOnly ?? false
		this.selector = new CandidateSelector(config.random ?? defaultRandom)
	}

	validate(): void {
		if (this.target.mode !== 'explicit') {
			return
		}
		const { replacement, excluded } = this.target
		if (replacement === this.brokerId) {
			throw new InvalidExplicitTargetError(replacement)
		}
		if (excluded?.includes(replacement)) {
			throw new ConfigurationError('Replacement broker is excluded', [
				`broker ${replacement} is on the exclusion list`,
			])
		}
	}

	apply(partition: PlannedPartition): PolicyOutcome {
		const { replicas } = partition
		const index = replicas.indexOf(this.brokerId)

		if (index < 0) {
			return { type: 'skip', reason: 'not-a-replica' }
		}
		if (this.leaderOnly && index !== 0) {
			return { type: 'skip', reason: 'not-leader' }
		}

		const replacement = this.selectReplacement(partition)
		return { type: 'reassign', replicas: replicas.replaceAt(index, replacement) }
	}

	private selectReplacement(partition: PlannedPartition): BrokerId {
		const used = partition.replicas.brokers

		if (this.target.mode === 'explicit') {
			return this.selector.pickExplicit(this.target.replacement, used, partition)
		}

		try {
			return this.selector.pick(this.target.pool, used, partition)
		} catch (error) {
			if (error instanceof NoCandidateError) {
				throw new NoReplacementFoundError(partition.topic, partition.partition, this.brokerId)
			}
			throw error
		}
	}
}
