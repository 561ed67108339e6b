/**
 * Metadata source reading saved `kafka-topics --describe` output
 *
 * Accepts both listing formats:
 *
 * ```
 * Topic: orders	Partition: 0	Leader: 1	Replicas: 1,2	Isr: 1,2
 * Topic: orders	TopicId: 3kx...	PartitionCount: 2	ReplicationFactor: 2	Configs:
 * 	Topic: orders	Partition: 0	Leader: 1	Replicas: 1,2	Isr: 1,2	Elr: 	LastKnownElr:
 * ```
 *
 * Summary lines (no `Partition:` field) are ignored.
 */

import { readFile } from 'node:fs/promises'

import { MetadataSourceError, type PartitionState } from '@replan/planner'

import type { MetadataSource } from './types.js'

const TOPIC_PATTERN = /(?:^|\s)Topic:\s*(\S+)/
const PARTITION_PATTERN = /(?:^|\s)Partition:\s*(\d+)/
const LEADER_PATTERN = /(?:^|\s)Leader:\s*(-?\d+|none)/
const REPLICAS_PATTERN = /(?:^|\s)Replicas:\s*([\d,]*)/

/**
 * Reads the whole input named by `path` ('-' for stdin)
 */
export type InputReader = (path: string) => Promise<string>

export const readInput: InputReader = async path => {
	if (path !== '-') {
		return readFile(path, 'utf-8')
	}
	const chunks: Buffer[] = []
	for await (const chunk of process.stdin) {
		chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)))
	}
	return Buffer.concat(chunks).toString('utf-8')
}

function parseReplicas(value: string, lineNumber: number): number[] {
	const parts = value.split(',').filter(part => part.length > 0)
	if (parts.length === 0) {
		throw new MetadataSourceError(`Line ${lineNumber}: partition has no replicas`)
	}
	return parts.map(part => parseInt(part, 10))
}

/**
 * Parse describe output into partition states, in listing order
 *
 * @throws MetadataSourceError on a partition line without leader or replicas
 */
export function parseDescribeOutput(text: string): PartitionState[] {
	const partitions: PartitionState[] = []
	const lines = text.split(/\r?\n/)

	for (let i = 0; i < lines.length; i++) {
		const line = lines[i]!
		const partitionMatch = PARTITION_PATTERN.exec(line)
		const topicMatch = TOPIC_PATTERN.exec(line)
		if (!partitionMatch || !topicMatch) {
			continue
		}

		const lineNumber = i + 1
		const leaderMatch = LEADER_PATTERN.exec(line)
		const replicasMatch = REPLICAS_PATTERN.exec(line)
		if (!leaderMatch || !replicasMatch) {
			throw new MetadataSourceError(`Line ${lineNumber}: missing Leader or Replicas field`)
		}

		const leader = leaderMatch[1] === 'none' ? -1 : parseInt(leaderMatch[1]!, 10)
		partitions.push({
			topic: topicMatch[1]!,
			partition: parseInt(partitionMatch[1]!, 10),
			leader: leader >= 0 ? leader : null,
			replicas: parseReplicas(replicasMatch[1]!, lineNumber),
		})
	}

	return partitions
}

export class DescribeOutputMetadataSource implements MetadataSource {
	private readonly path: string
	private readonly read: InputReader

	constructor(path: string, read: InputReader = readInput) {
		this.path = path
		this.read = read
	}

	async describe(topics?: string[]): Promise<PartitionState[]> {
		let text: string
		try {
			text = await this.read(this.path)
		} catch (error) {
			throw new MetadataSourceError(
				`Cannot read describe output from ${this.path === '-' ? 'stdin' : this.path}`,
				error instanceof Error ? error : new Error(String(error))
			)
		}

		const partitions = parseDescribeOutput(text)
		if (!topics) {
			return partitions
		}

		for (const topic of topics) {
			if (!partitions.some(partition => partition.topic === topic)) {
				throw new MetadataSourceError(`Topic ${topic} not found in describe output`)
			}
		}
		return partitions.filter(partition => topics.includes(partition.topic))
	}

	async close(): Promise<void> {
		// nothing to release
	}
}
