import process from 'node:process'
import {resolve} from 'node:path'
import chalk from 'chalk'
import type {Command} from 'commander'
import {buildLookupTree} from '../../core/context.js'
import {MalformedDeclarationError} from '../../errors.js'
import {contextOptions, loadConfig} from '../config.js'
import {TaskLoader} from '../task-loader.js'
import {getGlobalOptions} from '../utils.js'

export function registerContextCommand(program: Command): void {
  program
    .command('context')
    .description('Print the lookup context placeholders of a task resolve against')
    .argument('<file>', 'Task file (JSON or YAML)')
    .action(async (file: string, _options: Record<string, unknown>, cmd: Command) => {
      const {cwd} = getGlobalOptions(cmd)
      const root = resolve(cwd)
      const config = await loadConfig(root)
      const task = await new TaskLoader().load(resolve(root, file))

      try {
        const tree = buildLookupTree(task.spec, contextOptions(config))
        console.log(JSON.stringify(tree, null, 2))
      } catch (error: unknown) {
        if (error instanceof MalformedDeclarationError) {
          console.error(chalk.red(error.viaField('spec').describe()))
          process.exitCode = 1
          return
        }

        throw error
      }
    })
}
