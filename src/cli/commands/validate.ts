import process from 'node:process'
import {resolve} from 'node:path'
import type {Command} from 'commander'
import {contextOptions, loadConfig} from '../config.js'
import {ConsoleReporter, PrettyReporter} from '../reporter.js'
import {TaskChecker} from '../task-checker.js'
import {TaskLoader} from '../task-loader.js'
import {getGlobalOptions, logLevel} from '../utils.js'

export function registerValidateCommand(program: Command): void {
  program
    .command('validate')
    .description('Validate variable references in task files')
    .argument('<files...>', 'Task files (JSON or YAML)')
    .action(async (files: string[], _options: Record<string, unknown>, cmd: Command) => {
      const {cwd, json} = getGlobalOptions(cmd)
      const root = resolve(cwd)
      const config = await loadConfig(root)

      const reporter = (json ?? config.json)
        ? new ConsoleReporter({level: logLevel()})
        : new PrettyReporter()
      const checker = new TaskChecker(new TaskLoader(), reporter, {cwd: root, context: contextOptions(config)})

      const summary = await checker.check(files.map(file => resolve(root, file)))
      if (summary.invalid > 0 || summary.failed > 0) {
        process.exitCode = 1
      }
    })
}
