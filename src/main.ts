/*
 * CLI entry point: resolves one destination address to the channel it should be dispatched on.
 *
 *   main <destination> [--router <address>] [--root <address>]
 *
 * Router and root default to ROUTER_ADDRESS / ROUTER_ROOT_ADDRESS (see config.ts).
 * The channel name is written to stdout; rejections are logged and mapped to an exit code.
 */

import { Disposition } from '@addrnet/dto'
import { isRoutingRejection } from '@addrnet/reasons'
import { AddressRouter } from '@addrnet/router'
import { loadConfig, loadEnvFile } from './config'
import { createLogSink, getLogger, logRejection } from './utils/logger'

export const USAGE = 'usage: main <destination> [--router <address>] [--root <address>]'

export const EXIT_USAGE = 64

const EXIT_CODES: Record<Disposition, number> = {
  [Disposition.DELIVERED]: 0,
  [Disposition.REJECT]: 1,
  [Disposition.UNROUTABLE]: 1,
  [Disposition.ABORT]: 2,
}

export interface CliArgs {
  destination?: string
  router?: string
  root?: string
}

export interface CliIO {
  out: (line: string) => void
  err: (line: string) => void
}

const defaultIO: CliIO = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
}

export function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = {}
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i]
    if (arg === '--router') args.router = argv[++i]
    else if (arg === '--root') args.root = argv[++i]
    else if (args.destination === undefined) args.destination = arg
  }
  return args
}

export function run(argv: string[], env: NodeJS.ProcessEnv = process.env, io: CliIO = defaultIO): number {
  const args = parseArgs(argv)
  if (!args.destination) {
    io.err(USAGE)
    return EXIT_USAGE
  }

  try {
    const config = loadConfig(env)
    getLogger().level = config.logLevel
    const router = new AddressRouter({
      routerAddress: args.router ?? config.routerAddress ?? '',
      rootAddress: args.root ?? config.rootAddress,
      subtreeMatch: config.subtreeMatch,
      logSink: createLogSink(),
    })
    io.out(router.dispatchTo(args.destination))
    return 0
  } catch (e) {
    if (!isRoutingRejection(e)) throw e
    logRejection(e, args.destination)
    return EXIT_CODES[e.disposition]
  }
}

if (require.main === module) {
  loadEnvFile()
  process.exitCode = run(process.argv.slice(2))
}
