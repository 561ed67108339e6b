/**
 * Cluster metadata source interfaces
 */

import type { PartitionState } from '@replan/planner'

/**
 * Supplies the current partition placement
 */
export interface MetadataSource {
	/**
	 * Current state of every partition of `topics`, or of every topic when omitted
	 *
	 * @throws MetadataSourceError when the source is unreachable or returns bad data
	 */
	describe(topics?: string[]): Promise<PartitionState[]>

	close(): Promise<void>
}

/**
 * Sources that can also delete topics (replication factor 0)
 */
export interface TopicDeleter {
	deleteTopics(topics: string[]): Promise<void>
}

export function supportsTopicDeletion(source: MetadataSource): source is MetadataSource & TopicDeleter {
	return 'deleteTopics' in source && typeof source.deleteTopics === 'function'
}
