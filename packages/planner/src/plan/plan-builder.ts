/**
 * Plan builder
 *
 * Folds a policy over the partitions in the order the metadata source listed
 * them. Recoverable per-partition errors are collected and iteration goes on;
 * a fatal error propagates and no plan is returned.
 */

import { InvalidReplicaSetError, MetadataSourceError } from '../errors.js'
import { noopLogger } from '../logger.js'
import type { PartitionState, PlannedPartition, ReassignmentPolicy } from '../policies/types.js'
import { ReplicaSet } from '../replicas/replica-set.js'
import { tpKey } from '../utils/topic-partition.js'
import type { PlanBuilderOptions, PlanResult } from './types.js'

function normalize(state: PartitionState): PlannedPartition {
	try {
		return {
			topic: state.topic,
			partition: state.partition,
			replicas: ReplicaSet.fromMetadata(state.replicas, state.leader),
		}
	} catch (error) {
		if (error instanceof InvalidReplicaSetError) {
			throw new MetadataSourceError(`Malformed metadata for ${state.topic}-${state.partition}`, error)
		}
		throw error
	}
}

/**
 * Apply `policy` to every partition and collect the results
 *
 * @example
 * ```typescript
 * const policy = new ScalePolicy({ targetReplication: 3, pool: BrokerPool.range(0, 5) })
 * const result = buildPlan(partitions, policy, { logger })
 * process.stdout.write(renderPlan(toReassignmentPlan(result)))
 * ```
 */
export function buildPlan(
	partitions: Iterable<PartitionState>,
	policy: ReassignmentPolicy,
	options: PlanBuilderOptions = {}
): PlanResult {
	const logger = (options.logger ?? noopLogger).child({ policy: policy.name })
	const omitUnchanged = options.omitUnchanged ?? false

	policy.validate()

	const result: PlanResult = {
		entries: [],
		errors: new Map(),
		skipped: [],
		topicsToDelete: [],
	}
	let visited = 0

	for (const state of partitions) {
		visited++
		const partition = normalize(state)
		const { topic } = partition
		const outcome = policy.apply(partition)

		switch (outcome.type) {
			case 'reassign':
				logger.debug('partition reassigned', {
					topic,
					partition: partition.partition,
					from: partition.replicas.toArray(),
					to: outcome.replicas.toArray(),
				})
				result.entries.push({ topic, partition: partition.partition, replicas: outcome.replicas })
				break

			case 'unchanged':
				if (!omitUnchanged) {
					result.entries.push({ topic, partition: partition.partition, replicas: outcome.replicas })
				}
				break

			case 'error':
				logger.warn('partition left unchanged', {
					topic,
					partition: partition.partition,
					kind: outcome.error.kind,
					error: outcome.error.message,
				})
				result.errors.set(tpKey(topic, partition.partition), outcome.error)
				if (!omitUnchanged) {
					result.entries.push({ topic, partition: partition.partition, replicas: outcome.replicas })
				}
				break

			case 'skip':
				logger.debug('partition skipped', { topic, partition: partition.partition, reason: outcome.reason })
				result.skipped.push({ topic, partition: partition.partition, reason: outcome.reason })
				break

			case 'delete-topic':
				if (!result.topicsToDelete.includes(topic)) {
					result.topicsToDelete.push(topic)
				}
				break
		}
	}

	logger.info('plan built', {
		partitions: visited,
		entries: result.entries.length,
		errors: result.errors.size,
		skipped: result.skipped.length,
		topicsToDelete: result.topicsToDelete,
	})

	return result
}
