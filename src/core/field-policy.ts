import {IllegalArrayUsageError, joinFieldPath, type SpecError} from '../errors.js'
import {findReferencedName, isIsolatedReference} from '../substitution/variables.js'
import type {Step, TaskSpec} from '../types.js'
import {catalogParameters} from './catalog.js'

/**
 * How a field may use array parameters.
 * - `no-array`: never, not even as the whole value.
 * - `isolated-array`: only when the whole value is one array reference.
 */
export type FieldPolicy = 'no-array' | 'isolated-array'

export type PolicyField = {
  /** Locator relative to the step, e.g. `args[1]`. */
  field: string;
  value: string;
  policy: FieldPolicy;
}

/** Substitution-eligible string fields of a step, each with its policy. */
export function policyFields(step: Step): PolicyField[] {
  const fields: PolicyField[] = []
  const add = (field: string, value: string | undefined, policy: FieldPolicy) => {
    if (value !== undefined) {
      fields.push({field, value, policy})
    }
  }

  add('name', step.name, 'no-array')
  add('image', step.image, 'no-array')
  add('workingDir', step.workingDir, 'no-array')

  for (const [i, arg] of (step.command ?? []).entries()) {
    add(`command[${i}]`, arg, 'isolated-array')
  }

  for (const [i, arg] of (step.args ?? []).entries()) {
    add(`args[${i}]`, arg, 'isolated-array')
  }

  for (const [i, env] of (step.env ?? []).entries()) {
    add(`env[${i}].value`, env.value, 'no-array')
  }

  for (const [i, mount] of (step.volumeMounts ?? []).entries()) {
    add(`volumeMounts[${i}].name`, mount.name, 'no-array')
    add(`volumeMounts[${i}].mountPath`, mount.mountPath, 'no-array')
    add(`volumeMounts[${i}].subPath`, mount.subPath, 'no-array')
  }

  return fields
}

/** Applies a field's policy to its raw text; `stepPath` prefixes the error locator. */
export function checkArrayIsolation(
  {field, value, policy}: PolicyField,
  arrayNames: ReadonlySet<string>,
  stepPath: string
): IllegalArrayUsageError | undefined {
  const variable = findReferencedName(value, arrayNames)
  if (variable === undefined) {
    return undefined
  }

  if (policy === 'no-array') {
    return new IllegalArrayUsageError(variable, value, 'prohibited', field, joinFieldPath(stepPath, field))
  }

  if (!isIsolatedReference(value)) {
    return new IllegalArrayUsageError(variable, value, 'not-isolated', field, joinFieldPath(stepPath, field))
  }

  return undefined
}

/**
 * Checks every step, then the step template, against the array names and
 * returns the first violation.
 */
export function validateArrayUsage(
  steps: readonly Step[],
  arrayNames: ReadonlySet<string>,
  stepTemplate?: Step
): SpecError | undefined {
  if (arrayNames.size === 0) {
    return undefined
  }

  const targets: Array<{step: Step; path: string}> = steps.map((step, i) => ({step, path: `steps[${i}]`}))
  if (stepTemplate) {
    targets.push({step: stepTemplate, path: 'stepTemplate'})
  }

  for (const {step, path} of targets) {
    for (const field of policyFields(step)) {
      const error = checkArrayIsolation(field, arrayNames, path)
      if (error) {
        return error
      }
    }
  }

  return undefined
}

/** Array-usage pass over a whole spec, with array names taken from its parameters. */
export function validateParameterUsage(spec: TaskSpec): SpecError | undefined {
  const {arrayNames} = catalogParameters(spec.params)
  return validateArrayUsage(spec.steps ?? [], arrayNames, spec.stepTemplate)
}
