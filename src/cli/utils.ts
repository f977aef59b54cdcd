import process from 'node:process'
import type {Command} from 'commander'
import type {Level} from 'pino'

export type GlobalOptions = {
  cwd: string;
  json?: boolean;
}

export function getGlobalOptions(cmd: Command): GlobalOptions {
  return cmd.optsWithGlobals<GlobalOptions>()
}

const LOG_LEVELS: readonly Level[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace']

/** Log level of the JSON reporter, from `TASKLINT_LOG_LEVEL` (default: info). */
export function logLevel(env: NodeJS.ProcessEnv = process.env): Level {
  const value = env.TASKLINT_LOG_LEVEL?.toLowerCase()
  return LOG_LEVELS.find(level => level === value) ?? 'info'
}
