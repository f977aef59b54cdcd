import {MalformedDeclarationError, UndefinedReferenceError, type SpecError} from '../errors.js'
import {expand} from '../substitution/expand.js'
import {toJsonTree} from '../substitution/json-tree.js'
import type {ContextOptions, TaskSpec} from '../types.js'
import {buildLookupTree} from './context.js'

/**
 * Dry-runs placeholder expansion over the whole spec, declarations included,
 * and reports the first reference that does not resolve. The expanded tree
 * is discarded.
 */
export function validateExpansion(spec: TaskSpec, options?: ContextOptions): SpecError | undefined {
  try {
    const context = buildLookupTree(spec, options)
    expand(toJsonTree(spec), context)
  } catch (error: unknown) {
    if (error instanceof UndefinedReferenceError || error instanceof MalformedDeclarationError) {
      return error
    }

    throw error
  }

  return undefined
}
