/**
 * Plan types
 */

import type { PartitionPlanError } from '../errors.js'
import type { Logger } from '../logger.js'
import type { SkipReason } from '../policies/types.js'
import type { ReplicaSet } from '../replicas/replica-set.js'

/**
 * New replica assignment for one partition
 */
export interface ReassignmentEntry {
	topic: string
	partition: number
	replicas: ReplicaSet
}

export interface SkippedPartition {
	topic: string
	partition: number
	reason: SkipReason
}

/**
 * Everything one planning run produced
 */
export interface PlanResult {
	/** Entries in metadata iteration order */
	entries: ReassignmentEntry[]
	/** Per-partition errors keyed by tpKey(topic, partition) */
	errors: Map<string, PartitionPlanError>
	skipped: SkippedPartition[]
	/** Topics whose target replication is 0 */
	topicsToDelete: string[]
}

export interface PlanBuilderOptions {
	logger?: Logger
	/** Leave partitions whose replicas did not change out of the plan (default: false) */
	omitUnchanged?: boolean
}

/**
 * Reassignment document read by kafka-reassign-partitions
 */
export interface ReassignmentPlan {
	partitions: ReassignmentPlanPartition[]
	version: 1
}

export interface ReassignmentPlanPartition {
	topic: string
	partition: number
	replicas: number[]
}
