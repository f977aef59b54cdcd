import {differenceBy} from 'lodash-es'
import type {Step, StepTemplate} from '../types.js'

/**
 * Applies the step template to every step.
 *
 * Step values win. `env` is merged by name and `volumeMounts` by mount path:
 * the step's own entries come first, as declared, duplicates included, then
 * the template entries whose key the step does not use. A step with a
 * `script` does not inherit the template's `command`.
 */
export function mergeStepsWithStepTemplate(template: StepTemplate | undefined, steps: readonly Step[]): Step[] {
  if (!template) {
    return [...steps]
  }

  return steps.map(step => mergeStep(template, step))
}

function mergeStep(template: StepTemplate, step: Step): Step {
  return {
    name: step.name,
    image: step.image ?? template.image,
    workingDir: step.workingDir ?? template.workingDir,
    command: step.command ?? (step.script === undefined ? template.command : undefined),
    args: step.args ?? template.args,
    script: step.script,
    env: mergeBy(step.env, template.env, 'name'),
    volumeMounts: mergeBy(step.volumeMounts, template.volumeMounts, 'mountPath')
  }
}

function mergeBy<T extends object>(stepItems: T[] | undefined, templateItems: T[] | undefined, key: keyof T & string): T[] | undefined {
  if (!templateItems || templateItems.length === 0) {
    return stepItems
  }

  if (!stepItems) {
    return [...templateItems]
  }

  return [...stepItems, ...differenceBy(templateItems, stepItems, key)]
}
