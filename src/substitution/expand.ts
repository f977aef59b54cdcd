import {UndefinedReferenceError, joinFieldPath} from '../errors.js'
import type {JsonObject, JsonValue} from '../types.js'
import {extractReferences, isIsolatedReference, placeholderPattern} from './variables.js'

/**
 * Substitutes every `$(path)` placeholder found in the string leaves of `tree`
 * with the value at `path` in `context`.
 *
 * A string made of exactly one placeholder is replaced by the referenced value
 * itself, so a list stays a list. Placeholders embedded in longer text are
 * replaced by the value's text. Object keys are left untouched.
 *
 * @throws {UndefinedReferenceError} when a path does not exist in `context`.
 */
export function expand(tree: JsonValue, context: JsonValue, path = ''): JsonValue {
  if (typeof tree === 'string') {
    return expandString(tree, context, path)
  }

  if (Array.isArray(tree)) {
    return tree.map((item, index) => expand(item, context, joinFieldPath(path, `[${index}]`)))
  }

  if (isJsonObject(tree)) {
    const expanded: JsonObject = {}
    for (const [key, value] of Object.entries(tree)) {
      expanded[key] = expand(value, context, joinFieldPath(path, key))
    }

    return expanded
  }

  return tree
}

function expandString(value: string, context: JsonValue, path: string): JsonValue {
  if (isIsolatedReference(value)) {
    return resolveReference(extractReferences(value)[0], context, value, path)
  }

  return value.replace(placeholderPattern(), (_match, reference: string) =>
    toText(resolveReference(reference, context, value, path)))
}

/** Looks up a dotted reference in `context`, one segment at a time. */
export function resolveReference(reference: string, context: JsonValue, value: string, path: string): JsonValue {
  let current = context
  for (const segment of reference.split('.')) {
    if (!isJsonObject(current) || !Object.hasOwn(current, segment)) {
      throw new UndefinedReferenceError(reference, value, path)
    }

    current = current[segment]
  }

  return current
}

function toText(value: JsonValue): string {
  if (typeof value === 'string') {
    return value
  }

  if (value === null) {
    return ''
  }

  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value)
  }

  return JSON.stringify(value)
}

export function isJsonObject(value: JsonValue): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}
