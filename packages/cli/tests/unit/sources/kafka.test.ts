import { logLevel } from 'kafkajs'
import { describe, expect, it, vi } from 'vitest'

import { createLogger, MetadataSourceError } from '@replan/planner'

import { kafkaLogCreator, KafkaMetadataSource, type MetadataAdmin } from '../../../src/sources/kafka.js'

type TopicMetadata = Awaited<ReturnType<MetadataAdmin['fetchTopicMetadata']>>['topics']

function fakeAdmin(topics: TopicMetadata) {
	return {
		connect: vi.fn(async () => {}),
		disconnect: vi.fn(async () => {}),
		fetchTopicMetadata: vi.fn(async (options?: { topics: string[] }) => ({
			topics: options ? topics.filter(topic => options.topics.includes(topic.name)) : topics,
		})),
		deleteTopics: vi.fn(async (_options: { topics: string[]; timeout?: number }) => {}),
	}
}

const cluster: TopicMetadata = [
	{
		name: 'orders',
		partitions: [
			{ partitionId: 1, leader: -1, replicas: [2, 3] },
			{ partitionId: 0, leader: 2, replicas: [1, 2] },
		],
	},
	{ name: 'audit', partitions: [{ partitionId: 0, leader: 3, replicas: [3] }] },
]

describe('KafkaMetadataSource', () => {
	it('lists partitions sorted by id with leaderless partitions marked', async () => {
		const admin = fakeAdmin(cluster)
		const source = new KafkaMetadataSource(admin)

		expect(await source.describe(['orders'])).toEqual([
			{ topic: 'orders', partition: 0, leader: 2, replicas: [1, 2] },
			{ topic: 'orders', partition: 1, leader: null, replicas: [2, 3] },
		])
		expect(admin.fetchTopicMetadata).toHaveBeenCalledWith({ topics: ['orders'] })
	})

	it('fetches every topic when none is requested', async () => {
		const admin = fakeAdmin(cluster)
		const source = new KafkaMetadataSource(admin)

		const partitions = await source.describe()
		expect(partitions.map(p => `${p.topic}-${p.partition}`)).toEqual(['orders-0', 'orders-1', 'audit-0'])
		expect(admin.fetchTopicMetadata).toHaveBeenCalledWith(undefined)
	})

	it('connects once and disconnects on close', async () => {
		const admin = fakeAdmin(cluster)
		const source = new KafkaMetadataSource(admin)

		await source.describe(['orders'])
		await source.describe(['audit'])
		await source.close()
		await source.close()
		expect(admin.connect).toHaveBeenCalledTimes(1)
		expect(admin.disconnect).toHaveBeenCalledTimes(1)
	})

	it('retries disconnecting after a failed close', async () => {
		const admin = fakeAdmin(cluster)
		admin.disconnect.mockRejectedValueOnce(new Error('socket hang up'))
		const source = new KafkaMetadataSource(admin)

		await source.describe()
		await expect(source.close()).rejects.toThrow('socket hang up')
		await source.close()
		expect(admin.disconnect).toHaveBeenCalledTimes(2)
	})

	it('does not disconnect when it never connected', async () => {
		const admin = fakeAdmin(cluster)
		await new KafkaMetadataSource(admin).close()
		expect(admin.disconnect).not.toHaveBeenCalled()
	})

	it('reports a requested topic the cluster does not have', async () => {
		const source = new KafkaMetadataSource(fakeAdmin(cluster))
		await expect(source.describe(['ghost'])).rejects.toThrow(
			new MetadataSourceError('Topic ghost not found in cluster metadata')
		)
	})

	it('wraps connection failures', async () => {
		const admin = fakeAdmin(cluster)
		admin.connect.mockRejectedValueOnce(new Error('Connection timeout'))
		const source = new KafkaMetadataSource(admin)
		await expect(source.describe()).rejects.toThrow(
			new MetadataSourceError('Cannot connect to cluster', new Error('Connection timeout'))
		)
	})

	it('wraps metadata request failures', async () => {
		const admin = fakeAdmin(cluster)
		admin.fetchTopicMetadata.mockRejectedValueOnce(new Error('This server is not the leader'))
		const source = new KafkaMetadataSource(admin)
		await expect(source.describe()).rejects.toThrow('Cannot fetch topic metadata: This server is not the leader')
	})

	it('deletes topics through the admin client', async () => {
		const admin = fakeAdmin(cluster)
		const source = new KafkaMetadataSource(admin)
		await source.deleteTopics(['orders'])
		expect(admin.deleteTopics).toHaveBeenCalledWith({ topics: ['orders'] })
	})

	it('wraps topic deletion failures', async () => {
		const admin = fakeAdmin(cluster)
		admin.deleteTopics.mockRejectedValueOnce(new Error('Topic deletion is disabled'))
		const source = new KafkaMetadataSource(admin)
		await expect(source.deleteTopics(['orders', 'audit'])).rejects.toThrow(
			'Cannot delete topics orders, audit: Topic deletion is disabled'
		)
	})
})

describe('kafkaLogCreator', () => {
	it('forwards kafkajs entries to the logger at the matching level', () => {
		const lines: string[] = []
		const logger = createLogger('warn', {}, line => void lines.push(line))
		const log = kafkaLogCreator(logger)()

		log({
			namespace: 'Connection',
			level: logLevel.ERROR,
			label: 'ERROR',
			log: { message: 'Connection error', timestamp: '2024-01-01T00:00:00.000Z', broker: 'kafka1:9092' },
		})
		log({
			namespace: 'BrokerPool',
			level: logLevel.DEBUG,
			label: 'DEBUG',
			log: { message: 'Refreshing metadata', timestamp: '2024-01-01T00:00:00.000Z' },
		})

		expect(lines).toHaveLength(1)
		const { timestamp, ...payload } = JSON.parse(lines[0] ?? '')
		expect(timestamp).not.toBe('2024-01-01T00:00:00.000Z')
		expect(payload).toEqual({
			level: 'error',
			message: 'Connection error',
			component: 'kafkajs',
			namespace: 'Connection',
			broker: 'kafka1:9092',
		})
	})
})
