/**
 * Plan serializer
 *
 * Renders a plan result as the reassignment document consumed by
 * kafka-reassign-partitions, and reads such documents back.
 */

import { z } from 'zod'

import type { PlanResult, ReassignmentPlan } from './types.js'

const brokerIdSchema = z.number().int().nonnegative()

export const reassignmentPlanSchema = z.object({
	partitions: z.array(
		z.object({
			topic: z.string().min(1),
			partition: z.number().int().nonnegative(),
			replicas: z
				.array(brokerIdSchema)
				.min(1)
				.refine(replicas => new Set(replicas).size === replicas.length, {
					message: 'replicas must not repeat a broker',
				}),
		})
	),
	version: z.literal(1),
})

export function toReassignmentPlan(result: PlanResult): ReassignmentPlan {
	return {
		partitions: result.entries.map(entry => ({
			topic: entry.topic,
			partition: entry.partition,
			replicas: entry.replicas.toArray(),
		})),
		version: 1,
	}
}

export interface RenderOptions {
	/** Indent with two spaces (default: one line) */
	pretty?: boolean
}

/**
 * Serialize a plan to JSON text terminated by a newline
 */
export function renderPlan(plan: ReassignmentPlan, options: RenderOptions = {}): string {
	return `${JSON.stringify(plan, null, options.pretty ? 2 : undefined)}\n`
}

/**
 * Parse and validate a reassignment document
 *
 * @throws ZodError when the document does not match the reassignment format
 * @throws SyntaxError when the text is not JSON
 */
export function parseReassignmentPlan(text: string): ReassignmentPlan {
	return reassignmentPlanSchema.parse(JSON.parse(text))
}
