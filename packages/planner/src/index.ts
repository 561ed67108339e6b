export const plannerVersion = '0.1.0'

// Broker pool and replica sets
export { BrokerPool, isBrokerId } from './pool/broker-pool.js'
export type { BrokerId } from './pool/broker-pool.js'
export { ReplicaSet } from './replicas/replica-set.js'

// Selection
export { CandidateSelector } from './selector.js'
export { createSeededRandom, defaultRandom, pickOne, shuffle } from './utils/random.js'
export type { RandomSource } from './utils/random.js'

// Policies
export { ScalePolicy } from './policies/scale.js'
export type { ScalePolicyConfig } from './policies/scale.js'
export { DecommissionPolicy } from './policies/decommission.js'
export type { DecommissionPolicyConfig, ReplacementTarget } from './policies/decommission.js'
export type {
	PartitionState,
	PlannedPartition,
	PolicyName,
	PolicyOutcome,
	ReassignmentPolicy,
	SkipReason,
} from './policies/types.js'

// Plans
export { buildPlan } from './plan/plan-builder.js'
export { parseReassignmentPlan, reassignmentPlanSchema, renderPlan, toReassignmentPlan } from './plan/serializer.js'
export type { RenderOptions } from './plan/serializer.js'
export type {
	PlanBuilderOptions,
	PlanResult,
	ReassignmentEntry,
	ReassignmentPlan,
	ReassignmentPlanPartition,
	SkippedPartition,
} from './plan/types.js'

// Errors
export {
	ReplanError,
	ConfigurationError,
	MetadataSourceError,
	InvalidReplicaSetError,
	EmptyPoolError,
	PartitionPlanError,
	OutOfRangeError,
	NoCandidateError,
	NoReplacementFoundError,
	InvalidExplicitTargetError,
	isReplanError,
	isFatal,
} from './errors.js'
export type { ErrorKind } from './errors.js'

// Utils
export { tpKey, parseKey } from './utils/topic-partition.js'
export type { TopicPartition } from './utils/topic-partition.js'

// Logger
export { createLogger, isLogLevel, noopLogger, stderrSink, LOG_LEVELS } from './logger.js'
export type { Logger, LogLevel, LogSink } from './logger.js'
