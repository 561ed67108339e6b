import { describe, expect, it } from 'vitest'

import { ConfigurationError } from '@replan/planner'

import { parseDecommissionIntent, parseScaleIntent } from '../../../src/intent/schema.js'

function issuesOf(parse: () => unknown): string[] {
	try {
		parse()
	} catch (error) {
		if (error instanceof ConfigurationError) {
			return error.issues
		}
		throw error
	}
	throw new Error('expected a ConfigurationError')
}

describe('parseScaleIntent', () => {
	it('builds a scale intent from option values', () => {
		const intent = parseScaleIntent({
			topic: ' orders ',
			replication: '3',
			firstBrokerId: '0',
			lastBrokerId: '5',
			bootstrapServer: 'kafka1:9092, kafka2:9092',
			exclude: ['1,2', '2'],
			seed: '42',
			pretty: true,
		})
		expect(intent).toEqual({
			command: 'scale',
			source: { kind: 'kafka', brokers: ['kafka1:9092', 'kafka2:9092'], clientId: undefined },
			seed: 42,
			output: undefined,
			pretty: true,
			logLevel: 'warn',
			exclude: [1, 2],
			topic: 'orders',
			replication: 3,
			pool: { kind: 'range', lowId: 0, highId: 5 },
			changedOnly: false,
			deleteTopic: false,
		})
	})

	it('accepts an explicit broker list and a describe file', () => {
		const intent = parseScaleIntent({
			topic: 'orders',
			replication: '0',
			brokers: ['4,6', '9'],
			describeFile: '-',
			deleteTopic: true,
		})
		expect(intent.pool).toEqual({ kind: 'list', ids: [4, 6, 9] })
		expect(intent.source).toEqual({ kind: 'describe-file', path: '-' })
		expect(intent.replication).toBe(0)
		expect(intent.deleteTopic).toBe(true)
	})

	it('keeps a negative replication for the planner to report', () => {
		const intent = parseScaleIntent({ topic: 'orders', replication: '-1', brokers: ['1'], describeFile: '-' })
		expect(intent.replication).toBe(-1)
	})

	it('requires a topic', () => {
		expect(issuesOf(() => parseScaleIntent({ replication: '3' }))).toEqual(['topic: --topic is required'])
	})

	it('collects every violation at once', () => {
		expect(
			issuesOf(() =>
				parseScaleIntent({
					topic: 'orders',
					describeFile: 'describe.txt',
					bootstrapServer: 'kafka1:9092',
					firstBrokerId: '0',
				})
			)
		).toEqual([
			'bootstrapServer: exactly one of --bootstrap-server and --describe-file is required',
			'lastBrokerId: --first-broker-id and --last-broker-id must be given together',
			'replication: --replication is required',
		])
	})

	it('requires a broker pool', () => {
		expect(issuesOf(() => parseScaleIntent({ topic: 'orders', replication: '2', describeFile: '-' }))).toEqual([
			'firstBrokerId: a broker range (--first-broker-id/--last-broker-id) or --brokers is required',
		])
	})

	it('rejects an inverted range', () => {
		expect(
			issuesOf(() =>
				parseScaleIntent({
					topic: 'orders',
					replication: '2',
					describeFile: '-',
					firstBrokerId: '5',
					lastBrokerId: '1',
				})
			)
		).toEqual(['firstBrokerId: --first-broker-id must not exceed --last-broker-id'])
	})

	it('rejects a range together with a broker list', () => {
		expect(
			issuesOf(() =>
				parseScaleIntent({
					topic: 'orders',
					replication: '2',
					describeFile: '-',
					firstBrokerId: '0',
					lastBrokerId: '3',
					brokers: ['1'],
				})
			)
		).toEqual(['brokers: use either a broker range or --brokers, not both'])
	})

	it('rejects malformed broker ids', () => {
		expect(
			issuesOf(() =>
				parseScaleIntent({
					topic: 'orders',
					replication: '2',
					describeFile: '-',
					brokers: ['1'],
					exclude: ['1,x'],
				})
			)
		).toContain('exclude: x is not a broker id')
		expect(
			issuesOf(() =>
				parseScaleIntent({
					topic: 'orders',
					replication: 'three',
					describeFile: '-',
					brokers: ['1'],
				})
			)
		).toContain('replication: must be an integer')
	})

	it('reports the options in the error message', () => {
		expect(() => parseScaleIntent({ topic: 'orders', describeFile: '-', brokers: ['1'] })).toThrow(
			'Invalid scale options: replication: --replication is required'
		)
	})
})

describe('parseDecommissionIntent', () => {
	it('builds an explicit replacement intent', () => {
		const intent = parseDecommissionIntent({
			brokerId: '4',
			replaceWith: '7',
			describeFile: 'describe.txt',
			exclude: ['9'],
			leaderOnly: true,
		})
		expect(intent).toMatchObject({
			command: 'decommission',
			brokerId: 4,
			target: { mode: 'explicit', replacement: 7 },
			exclude: [9],
			leaderOnly: true,
			source: { kind: 'describe-file', path: 'describe.txt' },
		})
	})

	it('builds a random replacement intent over a range', () => {
		const intent = parseDecommissionIntent({
			brokerId: '4',
			firstBrokerId: '0',
			lastBrokerId: '8',
			bootstrapServer: 'kafka1:9092',
			clientId: 'ops',
		})
		expect(intent.target).toEqual({ mode: 'random', pool: { kind: 'range', lowId: 0, highId: 8 } })
		expect(intent.source).toEqual({ kind: 'kafka', brokers: ['kafka1:9092'], clientId: 'ops' })
		expect(intent.leaderOnly).toBe(false)
	})

	it('requires the broker to decommission', () => {
		expect(issuesOf(() => parseDecommissionIntent({ replaceWith: '7', describeFile: '-' }))).toEqual([
			'brokerId: --broker-id is required',
		])
	})

	it('rejects a replacement together with a pool', () => {
		expect(
			issuesOf(() => parseDecommissionIntent({ brokerId: '1', replaceWith: '7', brokers: ['2'], describeFile: '-' }))
		).toEqual(['replaceWith: use either --replace-with or a broker pool (--first-broker-id/--last-broker-id, --brokers)'])
	})

	it('requires a replacement or a pool', () => {
		expect(issuesOf(() => parseDecommissionIntent({ brokerId: '1', describeFile: '-' }))).toEqual([
			'firstBrokerId: one of --replace-with, a broker range or --brokers is required',
		])
	})

	it('rejects an empty bootstrap server list', () => {
		expect(issuesOf(() => parseDecommissionIntent({ brokerId: '1', replaceWith: '2', bootstrapServer: ' , ' }))).toEqual([
			'bootstrapServer: --bootstrap-server lists no host',
		])
	})
})
