/**
 * Command-line interface
 *
 * ```
 * kafka-replan scale --topic orders --replication 3 -f 0 -l 5 --bootstrap-server kafka1:9092 > plan.json
 * kafka-replan decommission --broker-id 4 -f 0 -l 8 --describe-file describe.txt > plan.json
 * kafka-reassign-partitions --bootstrap-server kafka1:9092 --reassignment-json-file plan.json --execute
 * ```
 */

import { Command, CommanderError, Option } from 'commander'

import {
	createLogger,
	createSeededRandom,
	defaultRandom,
	isReplanError,
	LOG_LEVELS,
	stderrSink,
	type Logger,
	type LogSink,
} from '@replan/planner'

import { parseDecommissionIntent, parseScaleIntent, type Intent } from './intent/schema.js'
import { createSource, runIntent, writeOutput, type RunContext } from './run.js'

export const ExitCode = {
	Ok: 0,
	Failure: 1,
	Configuration: 2,
	MetadataSource: 3,
	Planning: 4,
} as const

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode]

export function exitCodeFor(error: unknown): ExitCode {
	if (!isReplanError(error)) {
		return ExitCode.Failure
	}
	switch (error.kind) {
		case 'Configuration':
			return ExitCode.Configuration
		case 'MetadataSource':
			return ExitCode.MetadataSource
		default:
			return ExitCode.Planning
	}
}

/**
 * Replaceable collaborators, for tests and embedding
 */
export interface CliOverrides {
	createSource?: RunContext['createSource']
	writeOutput?: RunContext['writeOutput']
	logSink?: LogSink
	/** Help and usage text (default: stderr) */
	writeErr?: (text: string) => void
}

function collect(value: string, previous: string[] = []): string[] {
	return [...previous, value]
}

function addCommonOptions(command: Command): Command {
	return command
		.option('-f, --first-broker-id <id>', 'lowest broker id replacement brokers are drawn from')
		.option('-l, --last-broker-id <id>', 'highest broker id replacement brokers are drawn from')
		.option('--brokers <ids>', 'explicit broker ids to draw from, comma-separated (repeatable)', collect)
		.option('-x, --exclude <ids>', 'broker ids never chosen as targets, comma-separated (repeatable)', collect, [])
		.option('--bootstrap-server <hosts>', 'comma-separated Kafka bootstrap servers to read metadata from')
		.option('--describe-file <path>', "saved 'kafka-topics --describe' output to read metadata from ('-' for stdin)")
		.option('--client-id <id>', 'client id used when connecting to the cluster')
		.option('--seed <n>', 'seed for the random broker selection')
		.option('--output <file>', 'write the plan to a file instead of stdout')
		.option('--pretty', 'indent the plan JSON')
		.addOption(new Option('--log-level <level>', 'log level (logs go to stderr)').choices(LOG_LEVELS).default('warn'))
}

export function createProgram(execute: (intent: Intent) => Promise<void>, writeErr: (text: string) => void): Command {
	const program = new Command()
		.name('kafka-replan')
		.description('Generate Kafka partition reassignment plans')
		.exitOverride()
		.configureOutput({ writeOut: writeErr, writeErr })

	addCommonOptions(
		program
			.command('scale')
			.description('scale the replication factor of a topic up or down (0 deletes the topic)')
			.option('-t, --topic <name>', 'topic to scale')
			.option('-r, --replication <n>', 'desired number of replicas')
			.option('--changed-only', 'leave partitions whose replicas do not change out of the plan')
			.option('--delete-topic', 'delete the topic when --replication is 0')
	).action(async (options: Record<string, unknown>) => {
		await execute(parseScaleIntent(options))
	})

	addCommonOptions(
		program
			.command('decommission')
			.description('move every replica off a broker')
			.option('-b, --broker-id <id>', 'broker to move replicas away from')
			.option('-r, --replace-with <id>', 'use this broker as the replacement instead of a random one')
			.option('-o, --leader-only', 'only reassign partitions the broker currently leads')
	).action(async (options: Record<string, unknown>) => {
		await execute(parseDecommissionIntent(options))
	})

	return program
}

/**
 * Parse `argv` (without node and script path), run the command and return the exit code
 */
export async function runCli(argv: string[], overrides: CliOverrides = {}): Promise<ExitCode> {
	const sink = overrides.logSink ?? stderrSink
	const writeErr = overrides.writeErr ?? ((text: string) => void process.stderr.write(text))
	let logger: Logger = createLogger('error', { component: 'cli' }, sink)

	const program = createProgram(async intent => {
		logger = createLogger(intent.logLevel, { component: 'cli' }, sink)
		await runIntent(intent, {
			logger,
			random: intent.seed !== undefined ? createSeededRandom(intent.seed) : defaultRandom,
			createSource: overrides.createSource ?? createSource,
			writeOutput: overrides.writeOutput ?? writeOutput,
		})
	}, writeErr)

	try {
		await program.parseAsync(argv, { from: 'user' })
		return ExitCode.Ok
	} catch (error) {
		if (error instanceof CommanderError) {
			return error.exitCode === 0 ? ExitCode.Ok : ExitCode.Configuration
		}
		const message = error instanceof Error ? error.message : String(error)
		logger.error(message, isReplanError(error) ? { kind: error.kind } : {})
		return exitCodeFor(error)
	}
}
