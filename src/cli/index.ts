#!/usr/bin/env node
import 'dotenv/config'
import process from 'node:process'
import {Command} from 'commander'
import {registerContextCommand} from './commands/context.js'
import {registerValidateCommand} from './commands/validate.js'

async function main() {
  const program = new Command()

  program
    .name('tasklint')
    .description('Static validation of variable references in task specifications')
    .version('0.1.0')
    .option('--cwd <path>', 'Directory holding .tasklint.yml, and base of relative task paths', process.env.TASKLINT_CWD ?? process.cwd())
    .option('--json', 'Output structured JSON logs')

  registerValidateCommand(program)
  registerContextCommand(program)

  await program.parseAsync()
}

try {
  await main()
} catch (error: unknown) {
  console.error('Fatal error:', error)
  throw error
}
