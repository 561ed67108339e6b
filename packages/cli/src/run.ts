/**
 * Planning run
 *
 * intent -> policy -> metadata fetch -> plan -> output, then topic deletion
 * when the scale target is 0 and the operator asked for it.
 */

import { writeFile } from 'node:fs/promises'

import {
	buildPlan,
	renderPlan,
	toReassignmentPlan,
	type Logger,
	type PlanResult,
	type RandomSource,
} from '@replan/planner'

import { createPolicy } from './intent/policy.js'
import type { Intent, SourceSpec } from './intent/schema.js'
import { DescribeOutputMetadataSource } from './sources/describe-output.js'
import { createKafkaMetadataSource } from './sources/kafka.js'
import { supportsTopicDeletion, type MetadataSource } from './sources/types.js'

export interface RunContext {
	logger: Logger
	random: RandomSource
	createSource(spec: SourceSpec, logger: Logger): MetadataSource
	/** Write the rendered plan to `path`, or to stdout when undefined */
	writeOutput(text: string, path: string | undefined): Promise<void>
}

export function createSource(spec: SourceSpec, logger: Logger): MetadataSource {
	if (spec.kind === 'describe-file') {
		return new DescribeOutputMetadataSource(spec.path)
	}
	return createKafkaMetadataSource({ brokers: spec.brokers, clientId: spec.clientId, logger })
}

export async function writeOutput(text: string, path: string | undefined): Promise<void> {
	if (path === undefined) {
		process.stdout.write(text)
		return
	}
	await writeFile(path, text, 'utf-8')
}

async function handleTopicDeletion(
	intent: Intent,
	source: MetadataSource,
	topics: string[],
	logger: Logger
): Promise<void> {
	if (topics.length === 0 || intent.command !== 'scale') {
		return
	}
	if (!intent.deleteTopic) {
		logger.warn('replication factor 0 requested; pass --delete-topic to delete the topic', { topics })
		return
	}
	if (!supportsTopicDeletion(source)) {
		logger.warn('metadata source cannot delete topics; delete them with kafka-topics --delete', { topics })
		return
	}
	await source.deleteTopics(topics)
	logger.info('topics deleted', { topics })
}

/**
 * Close the source without letting a close failure replace the run's outcome
 */
async function closeSource(source: MetadataSource, logger: Logger): Promise<void> {
	try {
		await source.close()
	} catch (error) {
		logger.warn('failed to close metadata source', {
			error: error instanceof Error ? error.message : String(error),
		})
	}
}

/**
 * Run one planning intent end to end
 *
 * @throws ConfigurationError before any metadata is fetched
 * @throws MetadataSourceError or a fatal planning error; no plan is written then
 */
export async function runIntent(intent: Intent, context: RunContext): Promise<PlanResult> {
	const logger = context.logger.child({ command: intent.command })
	const policy = createPolicy(intent, context.random)
	policy.validate()

	const source = context.createSource(intent.source, logger)
	try {
		const topics = intent.command === 'scale' ? [intent.topic] : undefined
		const partitions = await source.describe(topics)

		const result = buildPlan(partitions, policy, {
			logger,
			omitUnchanged: intent.command === 'scale' && intent.changedOnly,
		})

		if (result.errors.size > 0) {
			logger.warn('plan keeps current replicas for some partitions', { partitions: [...result.errors.keys()] })
		}

		await context.writeOutput(renderPlan(toReassignmentPlan(result), { pretty: intent.pretty }), intent.output)
		await handleTopicDeletion(intent, source, result.topicsToDelete, logger)
		return result
	} finally {
		await closeSource(source, logger)
	}
}
