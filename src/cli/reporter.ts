import pino, {type DestinationStream, type Level, type Logger} from 'pino'
import chalk from 'chalk'

/** Reference to a validated task for display and keying purposes. */
export type TaskRef = {
  file: string;
  /** `metadata.name`, when the document has one. */
  name?: string;
}

/**
 * Discriminated union of validation run events.
 *
 * Lifecycle:
 * 1. RUN_START
 * 2. For each file: TASK_VALID, TASK_INVALID or TASK_LOAD_FAILED
 * 3. RUN_FINISHED
 */
export type RunStartEvent = {
  event: 'RUN_START';
  files: number;
}

export type TaskValidEvent = {
  event: 'TASK_VALID';
  task: TaskRef;
}

export type TaskInvalidEvent = {
  event: 'TASK_INVALID';
  task: TaskRef;
  code: string;
  message: string;
  paths: string[];
  details?: string;
}

export type TaskLoadFailedEvent = {
  event: 'TASK_LOAD_FAILED';
  file: string;
  code: string;
  message: string;
}

export type RunFinishedEvent = {
  event: 'RUN_FINISHED';
  valid: number;
  invalid: number;
  failed: number;
}

export type ValidationEvent =
  | RunStartEvent
  | TaskValidEvent
  | TaskInvalidEvent
  | TaskLoadFailedEvent
  | RunFinishedEvent

export type Reporter = {
  emit(event: ValidationEvent): void;
}

/**
 * Reporter that outputs structured JSON logs via pino.
 * Suitable for CI/CD environments and log aggregation.
 */
export class ConsoleReporter implements Reporter {
  private readonly logger: Logger

  constructor(options?: {level?: Level; destination?: DestinationStream}) {
    const pinoOptions = {level: options?.level ?? 'info'}
    this.logger = options?.destination ? pino(pinoOptions, options.destination) : pino(pinoOptions)
  }

  emit(event: ValidationEvent): void {
    switch (event.event) {
      case 'TASK_INVALID':
      case 'TASK_LOAD_FAILED': {
        this.logger.error(event)
        break
      }

      default: {
        this.logger.info(event)
      }
    }
  }
}

/**
 * Reporter printing one colored line per task, with the offending field
 * paths and remediation hints indented below failures.
 */
export class PrettyReporter implements Reporter {
  private readonly print: (line: string) => void

  constructor(options?: {print?: (line: string) => void}) {
    this.print = options?.print ?? (line => {
      console.log(line)
    })
  }

  emit(event: ValidationEvent): void {
    switch (event.event) {
      case 'RUN_START': {
        break
      }

      case 'TASK_VALID': {
        this.print(`${chalk.green('✓')} ${formatTask(event.task)}`)
        break
      }

      case 'TASK_INVALID': {
        this.print(`${chalk.red('✗')} ${formatTask(event.task)} ${chalk.red(event.message)}`)
        for (const path of event.paths.filter(Boolean)) {
          this.print(chalk.gray(`    at ${path}`))
        }

        if (event.details) {
          this.print(chalk.gray(`    ${event.details}`))
        }

        break
      }

      case 'TASK_LOAD_FAILED': {
        this.print(`${chalk.red('!')} ${event.file} ${chalk.red(event.message)}`)
        break
      }

      case 'RUN_FINISHED': {
        this.handleRunFinished(event)
        break
      }
    }
  }

  private handleRunFinished(event: RunFinishedEvent): void {
    const problems = event.invalid + event.failed
    const total = event.valid + problems
    const summary = `${event.valid}/${total} task${total === 1 ? '' : 's'} valid`
    this.print(problems === 0 ? chalk.bold.green(`\n${summary}`) : chalk.bold.red(`\n${summary}`))
  }
}

function formatTask(task: TaskRef): string {
  return task.name ? `${task.file} ${chalk.cyan(`(${task.name})`)}` : task.file
}
