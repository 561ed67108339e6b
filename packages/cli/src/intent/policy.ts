import { BrokerPool, DecommissionPolicy, ScalePolicy, type RandomSource, type ReassignmentPolicy } from '@replan/planner'

import type { Intent, PoolSpec } from './schema.js'

export function createPool(spec: PoolSpec, exclude: readonly number[]): BrokerPool {
	return spec.kind === 'range' ? BrokerPool.range(spec.lowId, spec.highId, exclude) : BrokerPool.of(spec.ids, exclude)
}

/**
 * Build the policy an intent asks for
 *
 * @throws ConfigurationError when the broker pool is invalid
 */
export function createPolicy(intent: Intent, random: RandomSource): ReassignmentPolicy {
	if (intent.command === 'scale') {
		return new ScalePolicy({
			targetReplication: intent.replication,
			pool: createPool(intent.pool, intent.exclude),
			random,
		})
	}

	const { target } = intent
	return new DecommissionPolicy({
		brokerId: intent.brokerId,
		target:
			target.mode === 'explicit'
				? { mode: 'explicit', replacement: target.replacement, excluded: intent.exclude }
				: { mode: 'random', pool: createPool(target.pool, intent.exclude) },
		leaderOnly: intent.leaderOnly,
		random,
	})
}
