import { mkdtemp, readFile, rm } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'

import { createLogger } from '@replan/planner'

import { parseScaleIntent } from '../../src/intent/schema.js'
import { runIntent, writeOutput } from '../../src/run.js'
import type { MetadataSource } from '../../src/sources/types.js'

describe('writeOutput', () => {
	let dir: string

	beforeEach(async () => {
		dir = await mkdtemp(join(tmpdir(), 'replan-'))
	})

	afterEach(async () => {
		await rm(dir, { recursive: true, force: true })
	})

	it('writes the plan to the given file', async () => {
		const path = join(dir, 'plan.json')
		await writeOutput('{"partitions":[],"version":1}\n', path)
		expect(await readFile(path, 'utf-8')).toBe('{"partitions":[],"version":1}\n')
	})

	it('writes to stdout without a path', async () => {
		const stdout = vi.spyOn(process.stdout, 'write').mockImplementation(() => true)
		await writeOutput('{"partitions":[],"version":1}\n', undefined)
		expect(stdout).toHaveBeenCalledWith('{"partitions":[],"version":1}\n')
		stdout.mockRestore()
	})
})

describe('runIntent', () => {
	it('warns when the source cannot delete topics', async () => {
		const lines: string[] = []
		const source: MetadataSource = {
			describe: async () => [{ topic: 'orders', partition: 0, leader: 1, replicas: [1] }],
			close: async () => {},
		}
		const outputs: string[] = []

		const result = await runIntent(
			parseScaleIntent({ topic: 'orders', replication: '0', brokers: ['1'], describeFile: '-', deleteTopic: true }),
			{
				logger: createLogger('warn', {}, line => void lines.push(line)),
				random: () => 0,
				createSource: () => source,
				writeOutput: async text => {
					outputs.push(text)
				},
			}
		)

		expect(result.topicsToDelete).toEqual(['orders'])
		expect(outputs).toEqual(['{"partitions":[],"version":1}\n'])
		const { timestamp: _timestamp, ...payload } = JSON.parse(lines[0] ?? '')
		expect(payload).toEqual({
			level: 'warn',
			message: 'metadata source cannot delete topics; delete them with kafka-topics --delete',
			command: 'scale',
			topics: ['orders'],
		})
	})
})
