import {MissingFieldError, type SpecError} from '../errors.js'
import type {ContextOptions, Task, TaskSpec} from '../types.js'
import {validateExpansion} from './expansion.js'
import {validateParameterUsage} from './field-policy.js'
import {mergeStepsWithStepTemplate} from './step-template.js'
import {
  validateDeclaredWorkspaces,
  validateObjectMetadata,
  validateParameterTypes,
  validateResources,
  validateStepNames,
  validateSteps,
  validateVolumes
} from './structural.js'

/**
 * Validates a task: metadata first, then the spec. Locators of spec errors
 * are rooted at the task (`spec.steps[0].image`).
 */
export function validateTask(task: Task, options?: ContextOptions): SpecError | undefined {
  const metadataError = validateObjectMetadata(task.metadata)
  if (metadataError) {
    return metadataError
  }

  return validateTaskSpec(task.spec, options)?.viaField('spec')
}

/**
 * Runs every check on a spec in a fixed order and returns the first failure.
 *
 * Reference resolution (expansion dry run) runs before the structural checks;
 * array usage runs last, once names and types are known to be sound.
 */
export function validateTaskSpec(spec: TaskSpec, options: ContextOptions = {}): SpecError | undefined {
  if (isEmptySpec(spec)) {
    return new MissingFieldError('')
  }

  const steps = spec.steps ?? []
  if (steps.length === 0) {
    return new MissingFieldError('steps')
  }

  return validateExpansion(spec, options)
    ?? validateVolumes(spec.volumes)
    ?? validateDeclaredWorkspaces(spec.workspaces, steps, spec.stepTemplate, options.workspaceRoot)
    ?? validateSteps(mergeStepsWithStepTemplate(spec.stepTemplate, steps))
    ?? validateResources(spec.resources)
    ?? validateParameterTypes(spec.params)
    ?? validateStepNames(steps)
    ?? validateParameterUsage(spec)
}

function isEmptySpec(spec: TaskSpec): boolean {
  return Object.values(spec).every(value => value === undefined)
}
