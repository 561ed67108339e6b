/**
 * Planner error hierarchy
 *
 * Every error carries a kind and a fatal flag. Fatal errors abort the whole run
 * and no plan is emitted; non-fatal ones are recorded per partition.
 */

/**
 * Error kinds produced by the planner and its collaborators
 */
export type ErrorKind =
	| 'Configuration'
	| 'MetadataSource'
	| 'InvalidReplicaSet'
	| 'EmptyPool'
	| 'OutOfRange'
	| 'NoCandidate'
	| 'NoReplacementFound'
	| 'InvalidExplicitTarget'

/**
 * Base class for all planner errors
 */
export class ReplanError extends Error {
	readonly kind: ErrorKind

	/** Whether this error aborts the whole run */
	readonly fatal: boolean

	constructor(message: string, kind: ErrorKind, fatal: boolean) {
		super(message)
		this.name = 'ReplanError'
		this.kind = kind
		this.fatal = fatal

		// Maintains proper stack trace for where error was thrown (V8 only)
		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, this.constructor)
		}
	}
}

/**
 * Bad or missing operator intent, reported before any metadata is fetched
 */
export class ConfigurationError extends ReplanError {
	readonly issues: string[]

	constructor(message: string, issues: string[] = []) {
		const details = issues.length > 0 ? `: ${issues.join('; ')}` : ''
		super(`${message}${details}`, 'Configuration', true)
		this.name = 'ConfigurationError'
		this.issues = issues
	}
}

/**
 * Cluster metadata could not be read or was malformed
 */
export class MetadataSourceError extends ReplanError {
	override readonly cause?: Error

	constructor(message: string, cause?: Error) {
		const causeStr = cause ? `: ${cause.message}` : ''
		super(`${message}${causeStr}`, 'MetadataSource', true)
		this.name = 'MetadataSourceError'
		this.cause = cause
	}
}

/**
 * A replica list violates the replica set invariants (empty, duplicates, bad ids)
 */
export class InvalidReplicaSetError extends ReplanError {
	readonly brokers: readonly number[]

	constructor(brokers: readonly number[], reason: string) {
		super(`Invalid replica set [${brokers.join(',')}]: ${reason}`, 'InvalidReplicaSet', true)
		this.name = 'InvalidReplicaSetError'
		this.brokers = brokers
	}
}

/**
 * The broker pool has no candidate left once the exclusions are applied
 */
export class EmptyPoolError extends ReplanError {
	readonly exclude: readonly number[]

	constructor(exclude: readonly number[]) {
		super(`No broker left in pool after excluding [${exclude.join(',')}]`, 'EmptyPool', false)
		this.name = 'EmptyPoolError'
		this.exclude = exclude
	}
}

/**
 * Base class for errors scoped to one partition
 */
export class PartitionPlanError extends ReplanError {
	readonly topic: string
	readonly partition: number

	constructor(message: string, kind: ErrorKind, fatal: boolean, topic: string, partition: number) {
		super(`${message} (${topic}-${partition})`, kind, fatal)
		this.name = 'PartitionPlanError'
		this.topic = topic
		this.partition = partition
	}
}

/**
 * Scale target outside the valid bounds; the partition is left unchanged
 */
export class OutOfRangeError extends PartitionPlanError {
	readonly targetReplication: number

	constructor(topic: string, partition: number, targetReplication: number) {
		super(`Replication factor ${targetReplication} is out of range`, 'OutOfRange', false, topic, partition)
		this.name = 'OutOfRangeError'
		this.targetReplication = targetReplication
	}
}

/**
 * Scale-up could not find enough distinct brokers; the partition is left unchanged
 */
export class NoCandidateError extends PartitionPlanError {
	readonly required: number
	readonly available: number

	constructor(topic: string, partition: number, required: number, available: number) {
		super(
			`Need ${required} more distinct broker(s) but only ${available} available`,
			'NoCandidate',
			false,
			topic,
			partition
		)
		this.name = 'NoCandidateError'
		this.required = required
		this.available = available
	}
}

/**
 * Decommission could not find any replacement broker
 *
 * Aborts the run: a partial decommission plan would leave data on a broker the
 * operator believes is evacuated.
 */
export class NoReplacementFoundError extends PartitionPlanError {
	readonly brokerId: number

	constructor(topic: string, partition: number, brokerId: number) {
		super(
			`Cannot find any replacement for broker ${brokerId}. Maybe the cluster has a single broker?`,
			'NoReplacementFound',
			true,
			topic,
			partition
		)
		this.name = 'NoReplacementFoundError'
		this.brokerId = brokerId
	}
}

/**
 * Explicit replacement broker already hosts a replica of the partition
 */
export class InvalidExplicitTargetError extends ReplanError {
	readonly brokerId: number
	readonly topic?: string
	readonly partition?: number

	constructor(brokerId: number, topic?: string, partition?: number) {
		const where = topic !== undefined ? ` of ${topic}-${partition}` : ''
		super(`Replacement broker ${brokerId} is already a replica${where}`, 'InvalidExplicitTarget', true)
		this.name = 'InvalidExplicitTargetError'
		this.brokerId = brokerId
		this.topic = topic
		this.partition = partition
	}
}

/**
 * Check if an error is a ReplanError
 */
export function isReplanError(error: unknown): error is ReplanError {
	return error instanceof ReplanError
}

/**
 * Check if an error should abort the whole run
 *
 * Errors that are not ReplanErrors are treated as fatal.
 */
export function isFatal(error: unknown): boolean {
	if (isReplanError(error)) {
		return error.fatal
	}
	return true
}
