export { runCli, createProgram, exitCodeFor, ExitCode } from './cli.js'
export type { CliOverrides } from './cli.js'
export { runIntent, createSource, writeOutput } from './run.js'
export type { RunContext } from './run.js'
export { parseScaleIntent, parseDecommissionIntent, scaleIntentSchema, decommissionIntentSchema } from './intent/schema.js'
export type { Intent, ScaleIntent, DecommissionIntent, PoolSpec, SourceSpec } from './intent/schema.js'
export { createPolicy, createPool } from './intent/policy.js'

// Metadata sources
export { KafkaMetadataSource, createKafkaMetadataSource, kafkaLogCreator } from './sources/kafka.js'
export type { MetadataAdmin, KafkaMetadataSourceConfig } from './sources/kafka.js'
export { DescribeOutputMetadataSource, parseDescribeOutput, readInput } from './sources/describe-output.js'
export type { InputReader } from './sources/describe-output.js'
export { supportsTopicDeletion } from './sources/types.js'
export type { MetadataSource, TopicDeleter } from './sources/types.js'
