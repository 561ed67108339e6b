/**
 * Metadata source backed by a live cluster
 *
 * Reads partition leaders and replicas through the kafkajs admin client.
 */

import { Kafka, logLevel, type LogEntry } from 'kafkajs'

import { MetadataSourceError, noopLogger, type Logger, type PartitionState } from '@replan/planner'

import type { MetadataSource, TopicDeleter } from './types.js'

const DEFAULT_CLIENT_ID = 'kafka-replan'

/**
 * The part of the kafkajs admin client this source uses
 */
export interface MetadataAdmin {
	connect(): Promise<void>
	disconnect(): Promise<void>
	fetchTopicMetadata(options?: { topics: string[] }): Promise<{
		topics: Array<{
			name: string
			partitions: Array<{ partitionId: number; leader: number; replicas: number[] }>
		}>
	}>
	deleteTopics(options: { topics: string[]; timeout?: number }): Promise<void>
}

export interface KafkaMetadataSourceConfig {
	/** Bootstrap servers, e.g. ['kafka1:9092'] */
	brokers: string[]
	clientId?: string
	logger?: Logger
}

function toError(error: unknown): Error {
	return error instanceof Error ? error : new Error(String(error))
}

/**
 * Forward kafkajs log entries to a planner logger
 */
export function kafkaLogCreator(logger: Logger) {
	const child = logger.child({ component: 'kafkajs' })
	return () =>
		({ namespace, level, log }: LogEntry): void => {
			const { message, timestamp: _timestamp, ...context } = log
			const entryContext = { namespace, ...context }
			switch (level) {
				case logLevel.ERROR:
					child.error(message, entryContext)
					break
				case logLevel.WARN:
					child.warn(message, entryContext)
					break
				case logLevel.INFO:
					child.info(message, entryContext)
					break
				default:
					child.debug(message, entryContext)
			}
		}
}

export class KafkaMetadataSource implements MetadataSource, TopicDeleter {
	private readonly admin: MetadataAdmin
	private readonly logger: Logger
	private connected = false

	constructor(admin: MetadataAdmin, logger: Logger = noopLogger) {
		this.admin = admin
		this.logger = logger.child({ component: 'metadata' })
	}

	private async ensureConnected(): Promise<void> {
		if (this.connected) {
			return
		}
		try {
			await this.admin.connect()
		} catch (error) {
			throw new MetadataSourceError('Cannot connect to cluster', toError(error))
		}
		this.connected = true
	}

	async describe(topics?: string[]): Promise<PartitionState[]> {
		await this.ensureConnected()
		this.logger.debug('fetching topic metadata', { topics: topics ?? 'all' })

		let metadata: Awaited<ReturnType<MetadataAdmin['fetchTopicMetadata']>>
		try {
			metadata = await this.admin.fetchTopicMetadata(topics ? { topics } : undefined)
		} catch (error) {
			throw new MetadataSourceError('Cannot fetch topic metadata', toError(error))
		}

		for (const name of topics ?? []) {
			if (!metadata.topics.some(topic => topic.name === name)) {
				throw new MetadataSourceError(`Topic ${name} not found in cluster metadata`)
			}
		}

		const partitions: PartitionState[] = []
		for (const topic of metadata.topics) {
			const sorted = [...topic.partitions].sort((a, b) => a.partitionId - b.partitionId)
			for (const partition of sorted) {
				partitions.push({
					topic: topic.name,
					partition: partition.partitionId,
					leader: partition.leader >= 0 ? partition.leader : null,
					replicas: [...partition.replicas],
				})
			}
		}

		this.logger.debug('fetched topic metadata', { topics: metadata.topics.length, partitions: partitions.length })
		return partitions
	}

	async deleteTopics(topics: string[]): Promise<void> {
		await this.ensureConnected()
		this.logger.info('deleting topics', { topics })
		try {
			await this.admin.deleteTopics({ topics })
		} catch (error) {
			throw new MetadataSourceError(`Cannot delete topics ${topics.join(', ')}`, toError(error))
		}
	}

	async close(): Promise<void> {
		if (!this.connected) {
			return
		}
		await this.admin.disconnect()
		this.connected = false
	}
}

/**
 * Create a source connected through a new kafkajs client
 */
export function createKafkaMetadataSource(config: KafkaMetadataSourceConfig): KafkaMetadataSource {
	const logger = config.logger ?? noopLogger
	const kafka = new Kafka({
		clientId: config.clientId ?? DEFAULT_CLIENT_ID,
		brokers: config.brokers,
		logLevel: logLevel.WARN,
		logCreator: kafkaLogCreator(logger),
	})
	return new KafkaMetadataSource(kafka.admin(), logger)
}
