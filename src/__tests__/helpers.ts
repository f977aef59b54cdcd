import {mkdtemp} from 'node:fs/promises'
import {tmpdir} from 'node:os'
import {join} from 'node:path'
import type {Reporter, ValidationEvent} from '../cli/reporter.js'
import type {Step, Task, TaskSpec} from '../types.js'

/**
 * Creates a temporary directory for test isolation.
 * Each test should use its own tmpdir to avoid interference.
 */
export async function createTmpDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'tasklint-test-'))
}

/** A minimal valid step, with overrides. */
export function makeStep(overrides: Step = {}): Step {
  return {name: 'main', image: 'alpine:3.20', ...overrides}
}

/** A spec with one minimal step unless `steps` is given. */
export function makeSpec(overrides: TaskSpec = {}): TaskSpec {
  return {steps: [makeStep()], ...overrides}
}

export function makeTask(spec: TaskSpec = makeSpec(), name = 'build'): Task {
  return {kind: 'Task', metadata: {name}, spec}
}

/**
 * Returns a reporter that records emitted events for assertions.
 */
export function recordingReporter(): {reporter: Reporter; events: ValidationEvent[]} {
  const events: ValidationEvent[] = []
  const reporter: Reporter = {
    emit(event: ValidationEvent) {
      events.push(event)
    }
  }

  return {reporter, events}
}
