import { resolve } from 'path'
import { Command, CommanderError, InvalidArgumentError, Option } from 'commander'
import { z } from 'zod'
import type { ResourceClient } from '../client/resource-client'
import { LogLevelSchema, validateConfig, type FanoutConfig } from '../config/schema'
import { loadConfig, loadConfigAuto } from '../config/loader'
import { applyEnvironment } from '../config/environment'
import { createPipeline } from '../pipelines/factory'
import { UsageError } from '../errors'
import { createLogger, type Logger, type Metrics } from '../observability'

export const USAGE = 'Usage: fanout <rootId> [--mode eager|stream] [--concurrency N] [--config path]'

export interface CliIO {
  out: (text: string) => void
  err: (text: string) => void
  env: NodeJS.ProcessEnv
  cwd: string
}

/**
 * Injected collaborators, mainly for tests
 */
export interface CliDeps {
  client?: ResourceClient
  logger?: Logger
  metrics?: Metrics
}

const CliOptionsSchema = z.object({
  mode: z.enum(['eager', 'stream']),
  concurrency: z.number().int().positive().optional(),
  config: z.string().optional(),
  logLevel: LogLevelSchema.optional(),
  pretty: z.boolean().optional(),
})

type CliOptions = z.infer<typeof CliOptionsSchema>

function parsePositiveInt(value: string): number {
  const parsed = Number(value)
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Must be a positive integer.')
  }
  return parsed
}

function resolveConfig(options: CliOptions, io: CliIO): FanoutConfig {
  const base = options.config ? loadConfig(resolve(io.cwd, options.config)) : loadConfigAuto(io.env, io.cwd)
  const config = applyEnvironment(base, io.env)

  return validateConfig({
    ...config,
    pipeline: { ...config.pipeline, maxPermits: options.concurrency ?? config.pipeline.maxPermits },
    logging: {
      level: options.logLevel ?? config.logging.level,
      pretty: options.pretty ?? config.logging.pretty,
    },
  })
}

async function execute(rootId: string | undefined, rawOptions: unknown, io: CliIO, deps: CliDeps): Promise<number> {
  if (!rootId) {
    throw new UsageError(USAGE)
  }

  const options = CliOptionsSchema.parse(rawOptions)
  const config = resolveConfig(options, io)
  const logger = deps.logger ?? createLogger(config.logging)

  const { sequencer } = createPipeline(config, { client: deps.client, logger, metrics: deps.metrics })
  await sequencer.emit(rootId, options.mode, line => io.out(`${line}\n`))
  return 0
}

/**
 * Parse argv and run the pipeline. Resolves to the process exit code.
 */
export async function runCli(argv: string[], io: CliIO, deps: CliDeps = {}): Promise<number> {
  let exitCode = 0

  const program = new Command()
    .name('fanout')
    .description('Fetch a root resource and the detail of each of its children')
    .argument('[rootId]', 'root resource identifier')
    .addOption(new Option('-m, --mode <mode>', 'output mode').choices(['eager', 'stream']).default('eager'))
    .option('-c, --concurrency <n>', 'max detail fetches in flight', parsePositiveInt)
    .option('--config <path>', 'YAML config file')
    .addOption(new Option('--log-level <level>', 'log level').choices(LogLevelSchema.options))
    .option('--pretty', 'pretty-print logs')
    .exitOverride()
    .configureOutput({
      writeOut: text => io.out(text),
      writeErr: text => io.err(text),
    })
    .action(async (rootId: string | undefined, options: unknown) => {
      exitCode = await execute(rootId, options, io, deps)
    })

  try {
    await program.parseAsync(argv, { from: 'user' })
    return exitCode
  } catch (error) {
    if (error instanceof CommanderError) {
      // commander already wrote its own message
      return error.exitCode
    }
    if (error instanceof UsageError) {
      io.err(`${error.message}\n`)
      return 1
    }
    io.err(`Error: ${error instanceof Error ? error.message : String(error)}\n`)
    return 1
  }
}
