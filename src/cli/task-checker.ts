import {relative} from 'node:path'
import {validateTask} from '../core/task-validator.js'
import {LoaderError} from '../errors.js'
import type {ContextOptions, Task} from '../types.js'
import type {Reporter, TaskRef} from './reporter.js'
import type {TaskLoader} from './task-loader.js'

export type CheckSummary = {
  valid: number;
  invalid: number;
  failed: number;
}

/**
 * Loads and validates task files one after the other, reporting each outcome.
 * Files that cannot be loaded are reported and counted, not thrown.
 */
export class TaskChecker {
  constructor(
    private readonly loader: TaskLoader,
    private readonly reporter: Reporter,
    private readonly options: {cwd?: string; context?: ContextOptions} = {}
  ) {}

  async check(files: string[]): Promise<CheckSummary> {
    const summary: CheckSummary = {valid: 0, invalid: 0, failed: 0}
    this.reporter.emit({event: 'RUN_START', files: files.length})

    for (const file of files) {
      const displayFile = this.options.cwd ? relative(this.options.cwd, file) : file

      let task: Task
      try {
        task = await this.loader.load(file)
      } catch (error: unknown) {
        if (!(error instanceof LoaderError)) {
          throw error
        }

        summary.failed++
        this.reporter.emit({event: 'TASK_LOAD_FAILED', file: displayFile, code: error.code, message: error.message})
        continue
      }

      const ref: TaskRef = {file: displayFile, name: task.metadata.name}
      const error = validateTask(task, this.options.context)
      if (error) {
        summary.invalid++
        this.reporter.emit({
          event: 'TASK_INVALID',
          task: ref,
          code: error.code,
          message: error.message,
          paths: error.paths,
          details: error.details
        })
      } else {
        summary.valid++
        this.reporter.emit({event: 'TASK_VALID', task: ref})
      }
    }

    this.reporter.emit({event: 'RUN_FINISHED', ...summary})
    return summary
  }
}
