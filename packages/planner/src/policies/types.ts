/**
 * Reassignment policy types and interfaces
 */

import type { PartitionPlanError } from '../errors.js'
import type { ReplicaSet } from '../replicas/replica-set.js'

/**
 * Current state of one partition as read from the metadata source
 */
export interface PartitionState {
	topic: string
	partition: number
	/** Leader broker id, or null when the partition has no leader */
	leader: number | null
	/** Replica broker ids in the order the source reported them */
	replicas: number[]
}

/**
 * Partition with its replicas normalized to leader-first order
 */
export interface PlannedPartition {
	topic: string
	partition: number
	replicas: ReplicaSet
}

/**
 * Why a policy left a partition out of the plan
 * - 'not-a-replica': the decommissioned broker does not host the partition
 * - 'not-leader': leader-only decommission and the broker is a follower
 */
export type SkipReason = 'not-a-replica' | 'not-leader'

/**
 * Result of applying a policy to one partition
 */
export type PolicyOutcome =
	| { type: 'reassign'; replicas: ReplicaSet }
	| { type: 'unchanged'; replicas: ReplicaSet }
	| { type: 'skip'; reason: SkipReason }
	| { type: 'delete-topic' }
	| { type: 'error'; replicas: ReplicaSet; error: PartitionPlanError }

export type PolicyName = 'scale' | 'decommission'

/**
 * Reassignment policy interface
 *
 * A policy turns one partition's replica set into a new one. Recoverable
 * problems come back as an 'error' outcome; fatal ones are thrown.
 */
export interface ReassignmentPolicy {
	readonly name: PolicyName

	/**
	 * Checks that need no partition data, run once before any partition
	 *
	 * @throws a fatal ReplanError when the intent can never succeed
	 */
	validate(): void

	apply(partition: PlannedPartition): PolicyOutcome
}
