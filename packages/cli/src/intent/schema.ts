/**
 * Operator intent validation
 *
 * Raw command-line option values are validated with zod and turned into typed
 * intents before any metadata is fetched. Every violation is collected into a
 * single ConfigurationError.
 */

import { z } from 'zod'

import { ConfigurationError, type LogLevel } from '@replan/planner'

const brokerIdString = z
	.string()
	.trim()
	.regex(/^\d+$/, 'must be a non-negative integer')
	.transform(value => parseInt(value, 10))

const integerString = z
	.string()
	.trim()
	.regex(/^-?\d+$/, 'must be an integer')
	.transform(value => parseInt(value, 10))

/** Comma-separated broker ids, possibly given several times */
const brokerIdLists = z
	.array(z.string())
	.default([])
	.transform((values, ctx) => {
		const ids: number[] = []
		for (const value of values) {
			for (const part of value.split(',')) {
				const trimmed = part.trim()
				if (trimmed.length === 0) {
					continue
				}
				if (!/^\d+$/.test(trimmed)) {
					ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${trimmed} is not a broker id` })
					return z.NEVER
				}
				ids.push(parseInt(trimmed, 10))
			}
		}
		return [...new Set(ids)]
	})

const logLevelSchema = z.enum(['silent', 'error', 'warn', 'info', 'debug']).default('warn')

const commonOptions = {
	bootstrapServer: z.string().optional(),
	describeFile: z.string().min(1).optional(),
	clientId: z.string().min(1).optional(),
	seed: integerString.optional(),
	output: z.string().min(1).optional(),
	pretty: z.boolean().default(false),
	logLevel: logLevelSchema,
	exclude: brokerIdLists,
	firstBrokerId: brokerIdString.optional(),
	lastBrokerId: brokerIdString.optional(),
	brokers: brokerIdLists.optional(),
}

export type SourceSpec = { kind: 'kafka'; brokers: string[]; clientId?: string } | { kind: 'describe-file'; path: string }

export type PoolSpec = { kind: 'range'; lowId: number; highId: number } | { kind: 'list'; ids: number[] }

interface CommonIntent {
	source: SourceSpec
	seed?: number
	output?: string
	pretty: boolean
	logLevel: LogLevel
	exclude: number[]
}

export interface ScaleIntent extends CommonIntent {
	command: 'scale'
	topic: string
	replication: number
	pool: PoolSpec
	changedOnly: boolean
	deleteTopic: boolean
}

export interface DecommissionIntent extends CommonIntent {
	command: 'decommission'
	brokerId: number
	target: { mode: 'random'; pool: PoolSpec } | { mode: 'explicit'; replacement: number }
	leaderOnly: boolean
}

export type Intent = ScaleIntent | DecommissionIntent

interface RawCommon {
	bootstrapServer?: string
	describeFile?: string
	clientId?: string
	firstBrokerId?: number
	lastBrokerId?: number
	brokers?: number[]
}

function checkSource(raw: RawCommon, ctx: z.RefinementCtx): void {
	const given = [raw.bootstrapServer, raw.describeFile].filter(value => value !== undefined).length
	if (given !== 1) {
		ctx.addIssue({
			code: z.ZodIssueCode.custom,
			message: 'exactly one of --bootstrap-server and --describe-file is required',
			path: ['bootstrapServer'],
		})
	}
	if (raw.bootstrapServer !== undefined && splitServers(raw.bootstrapServer).length === 0) {
		ctx.addIssue({
			code: z.ZodIssueCode.custom,
			message: '--bootstrap-server lists no host',
			path: ['bootstrapServer'],
		})
	}
}

function checkRange(raw: RawCommon, ctx: z.RefinementCtx): void {
	const hasFirst = raw.firstBrokerId !== undefined
	const hasLast = raw.lastBrokerId !== undefined
	if (hasFirst !== hasLast) {
		ctx.addIssue({
			code: z.ZodIssueCode.custom,
			message: '--first-broker-id and --last-broker-id must be given together',
			path: [hasFirst ? 'lastBrokerId' : 'firstBrokerId'],
		})
	}
	if (raw.firstBrokerId !== undefined && raw.lastBrokerId !== undefined && raw.firstBrokerId > raw.lastBrokerId) {
		ctx.addIssue({
			code: z.ZodIssueCode.custom,
			message: '--first-broker-id must not exceed --last-broker-id',
			path: ['firstBrokerId'],
		})
	}
	if (hasFirst && raw.brokers !== undefined) {
		ctx.addIssue({
			code: z.ZodIssueCode.custom,
			message: 'use either a broker range or --brokers, not both',
			path: ['brokers'],
		})
	}
	if (raw.brokers !== undefined && raw.brokers.length === 0) {
		ctx.addIssue({ code: z.ZodIssueCode.custom, message: '--brokers lists no broker', path: ['brokers'] })
	}
}

function hasPool(raw: RawCommon): boolean {
	return raw.firstBrokerId !== undefined || raw.brokers !== undefined
}

function splitServers(value: string): string[] {
	return value
		.split(',')
		.map(server => server.trim())
		.filter(server => server.length > 0)
}

function toSource(raw: RawCommon): SourceSpec {
	if (raw.describeFile !== undefined) {
		return { kind: 'describe-file', path: raw.describeFile }
	}
	return { kind: 'kafka', brokers: splitServers(raw.bootstrapServer ?? ''), clientId: raw.clientId }
}

function toPool(raw: RawCommon): PoolSpec {
	if (raw.brokers !== undefined) {
		return { kind: 'list', ids: raw.brokers }
	}
	return { kind: 'range', lowId: raw.firstBrokerId ?? 0, highId: raw.lastBrokerId ?? 0 }
}

export const scaleIntentSchema = z
	.object({
		...commonOptions,
		topic: z.string({ required_error: '--topic is required' }).trim().min(1, '--topic is required'),
		replication: integerString.optional(),
		changedOnly: z.boolean().default(false),
		deleteTopic: z.boolean().default(false),
	})
	.superRefine((raw, ctx) => {
		checkSource(raw, ctx)
		checkRange(raw, ctx)
		if (raw.replication === undefined) {
			ctx.addIssue({ code: z.ZodIssueCode.custom, message: '--replication is required', path: ['replication'] })
		}
		if (!hasPool(raw)) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				message: 'a broker range (--first-broker-id/--last-broker-id) or --brokers is required',
				path: ['firstBrokerId'],
			})
		}
	})
	.transform(
		(raw): ScaleIntent => ({
			command: 'scale',
			source: toSource(raw),
			seed: raw.seed,
			output: raw.output,
			pretty: raw.pretty,
			logLevel: raw.logLevel,
			exclude: raw.exclude,
			topic: raw.topic,
			replication: raw.replication ?? 0,
			pool: toPool(raw),
			changedOnly: raw.changedOnly,
			deleteTopic: raw.deleteTopic,
		})
	)

export const decommissionIntentSchema = z
	.object({
		...commonOptions,
		brokerId: brokerIdString.optional(),
		replaceWith: brokerIdString.optional(),
		leaderOnly: z.boolean().default(false),
	})
	.superRefine((raw, ctx) => {
		checkSource(raw, ctx)
		checkRange(raw, ctx)
		if (raw.brokerId === undefined) {
			ctx.addIssue({ code: z.ZodIssueCode.custom, message: '--broker-id is required', path: ['brokerId'] })
		}
		if (raw.replaceWith !== undefined && hasPool(raw)) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				message: 'use either --replace-with or a broker pool (--first-broker-id/--last-broker-id, --brokers)',
				path: ['replaceWith'],
			})
		}
		if (raw.replaceWith === undefined && !hasPool(raw)) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				message: 'one of --replace-with, a broker range or --brokers is required',
				path: ['firstBrokerId'],
			})
		}
	})
	.transform(
		(raw): DecommissionIntent => ({
			command: 'decommission',
			source: toSource(raw),
			seed: raw.seed,
			output: raw.output,
			pretty: raw.pretty,
			logLevel: raw.logLevel,
			exclude: raw.exclude,
			brokerId: raw.brokerId ?? 0,
			target:
				raw.replaceWith !== undefined
					? { mode: 'explicit', replacement: raw.replaceWith }
					: { mode: 'random', pool: toPool(raw) },
			leaderOnly: raw.leaderOnly,
		})
	)

function formatIssues(error: z.ZodError): string[] {
	return error.issues.map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
}

/**
 * @throws ConfigurationError listing every invalid option
 */
export function parseScaleIntent(options: unknown): ScaleIntent {
	const parsed = scaleIntentSchema.safeParse(options)
	if (!parsed.success) {
		throw new ConfigurationError('Invalid scale options', formatIssues(parsed.error))
	}
	return parsed.data
}

/**
 * @throws ConfigurationError listing every invalid option
 */
export function parseDecommissionIntent(options: unknown): DecommissionIntent {
	const parsed = decommissionIntentSchema.safeParse(options)
	if (!parsed.success) {
		throw new ConfigurationError('Invalid decommission options', formatIssues(parsed.error))
	}
	return parsed.data
}
