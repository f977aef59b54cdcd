import {MalformedDeclarationError, joinFieldPath} from '../errors.js'
import type {JsonObject, JsonValue} from '../types.js'

/**
 * Converts a typed value into a generic JSON tree.
 *
 * Follows JSON serialisation: object properties set to `undefined` are
 * dropped. Values with no JSON form (functions, symbols, bigints, non-finite
 * numbers, class instances, cycles, holes) throw a
 * {@link MalformedDeclarationError} located at the offending field.
 */
export function toJsonTree(value: unknown, path = ''): JsonValue {
  return convert(value, path, new Set())
}

function convert(value: unknown, path: string, ancestors: Set<object>): JsonValue {
  if (value === null || typeof value === 'string' || typeof value === 'boolean') {
    return value
  }

  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      throw new MalformedDeclarationError(`cannot serialize non-finite number ${value}`, path)
    }

    return value
  }

  if (typeof value !== 'object') {
    throw new MalformedDeclarationError(`cannot serialize value of type ${typeof value}`, path)
  }

  if (ancestors.has(value)) {
    throw new MalformedDeclarationError('cannot serialize circular structure', path)
  }

  ancestors.add(value)
  try {
    if (Array.isArray(value)) {
      return convertArray(value, path, ancestors)
    }

    const proto: unknown = Object.getPrototypeOf(value)
    if (proto !== Object.prototype && proto !== null) {
      throw new MalformedDeclarationError('cannot serialize non-plain object', path)
    }

    const tree: JsonObject = {}
    for (const [key, child] of Object.entries(value)) {
      if (child !== undefined) {
        tree[key] = convert(child, joinFieldPath(path, key), ancestors)
      }
    }

    return tree
  } finally {
    ancestors.delete(value)
  }
}

function convertArray(value: unknown[], path: string, ancestors: Set<object>): JsonValue[] {
  const tree: JsonValue[] = []
  for (let i = 0; i < value.length; i++) {
    const itemPath = joinFieldPath(path, `[${i}]`)
    if (!(i in value) || value[i] === undefined) {
      throw new MalformedDeclarationError('cannot serialize missing array element', itemPath)
    }

    tree.push(convert(value[i], itemPath, ancestors))
  }

  return tree
}
