import { describe, expect, it } from 'vitest'

import { parseReassignmentPlan, renderPlan, toReassignmentPlan } from '../../../src/plan/serializer.js'
import type { PlanResult } from '../../../src/plan/types.js'
import { ReplicaSet } from '../../../src/replicas/replica-set.js'

function result(entries: PlanResult['entries']): PlanResult {
	return { entries, errors: new Map(), skipped: [], topicsToDelete: [] }
}

describe('serializer', () => {
	it('renders the reassignment document on one line', () => {
		const plan = toReassignmentPlan(result([{ topic: 't', partition: 0, replicas: ReplicaSet.of([3, 0, 2]) }]))
		expect(renderPlan(plan)).toBe('{"partitions":[{"topic":"t","partition":0,"replicas":[3,0,2]}],"version":1}\n')
	})

	it('renders an empty plan', () => {
		expect(renderPlan(toReassignmentPlan(result([])))).toBe('{"partitions":[],"version":1}\n')
	})

	it('indents when pretty', () => {
		const plan = toReassignmentPlan(result([{ topic: 't', partition: 1, replicas: ReplicaSet.of([1]) }]))
		expect(renderPlan(plan, { pretty: true })).toBe(
			[
				'{',
				'  "partitions": [',
				'    {',
				'      "topic": "t",',
				'      "partition": 1,',
				'      "replicas": [',
				'        1',
				'      ]',
				'    }',
				'  ],',
				'  "version": 1',
				'}',
				'',
			].join('\n')
		)
	})

	it('keeps entry order and replica order', () => {
		const plan = toReassignmentPlan(
			result([
				{ topic: 'b', partition: 1, replicas: ReplicaSet.of([2, 1]) },
				{ topic: 'a', partition: 0, replicas: ReplicaSet.of([0, 2]) },
			])
		)
		expect(plan.partitions.map(p => `${p.topic}-${p.partition}:${p.replicas.join(',')}`)).toEqual([
			'b-1:2,1',
			'a-0:0,2',
		])
	})

	describe('parseReassignmentPlan', () => {
		it('reads a rendered plan back', () => {
			const text = '{"partitions":[{"topic":"t","partition":0,"replicas":[3,0,2]}],"version":1}'
			expect(parseReassignmentPlan(text)).toEqual({
				partitions: [{ topic: 't', partition: 0, replicas: [3, 0, 2] }],
				version: 1,
			})
		})

		it('rejects repeated brokers', () => {
			expect(() =>
				parseReassignmentPlan('{"partitions":[{"topic":"t","partition":0,"replicas":[1,1]}],"version":1}')
			).toThrow(/replicas must not repeat a broker/)
		})

		it('rejects empty replica lists', () => {
			expect(() =>
				parseReassignmentPlan('{"partitions":[{"topic":"t","partition":0,"replicas":[]}],"version":1}')
			).toThrow()
		})

		it('rejects other versions', () => {
			expect(() => parseReassignmentPlan('{"partitions":[],"version":2}')).toThrow()
		})

		it('rejects text that is not JSON', () => {
			expect(() => parseReassignmentPlan('not json')).toThrow(SyntaxError)
		})
	})
})
