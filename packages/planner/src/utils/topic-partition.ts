/**
 * Topic-partition key utilities
 *
 * Partition keys index per-partition errors in a plan result.
 */

/**
 * Topic-partition identifier
 */
export interface TopicPartition {
	topic: string
	partition: number
}

/**
 * Create a unique string key for a topic-partition pair
 */
export function tpKey(topic: string, partition: number): string {
	return `${topic}:${partition}`
}

/**
 * Parse a topic-partition key back into its components
 *
 * Splits on the last colon.
 */
export function parseKey(key: string): TopicPartition {
	const separator = key.lastIndexOf(':')
	return {
		topic: key.slice(0, separator),
		partition: parseInt(key.slice(separator + 1), 10),
	}
}
