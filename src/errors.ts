export class TasklintError extends Error {
  constructor(
    readonly code: string,
    message: string,
    options?: {cause?: unknown}
  ) {
    super(message, options)
    this.name = 'TasklintError'
  }
}

// -- Spec errors -------------------------------------------------------------

/**
 * A problem found in a task specification.
 *
 * `paths` locate the offending field from the root of the validated value
 * (e.g. `steps[0].args[1]`); callers render them next to the message.
 */
export class SpecError extends TasklintError {
  paths: string[]

  constructor(
    code: string,
    message: string,
    paths: string[],
    readonly details?: string,
    options?: {cause?: unknown}
  ) {
    super(code, message, options)
    this.name = 'SpecError'
    this.paths = paths
  }

  /** Prefixes every path with `field`, e.g. `steps[0].image` → `spec.steps[0].image`. */
  viaField(field: string): this {
    this.paths = this.paths.map(path => joinFieldPath(field, path))
    return this
  }

  describe(): string {
    const paths = this.paths.filter(Boolean)
    const located = paths.length > 0 ? `${this.message}: ${paths.join(', ')}` : this.message
    return this.details ? `${located}\n${this.details}` : located
  }
}

export class UndefinedReferenceError extends SpecError {
  constructor(
    readonly reference: string,
    value: string,
    path: string,
    options?: {cause?: unknown}
  ) {
    super(
      'UNDEFINED_REFERENCE',
      `non-existent variable in "${value}"`,
      [path],
      `"${reference}" is not defined`,
      options
    )
    this.name = 'UndefinedReferenceError'
  }
}

export type ArrayUsageViolation = 'prohibited' | 'not-isolated'

export class IllegalArrayUsageError extends SpecError {
  constructor(
    readonly variable: string,
    readonly value: string,
    readonly violation: ArrayUsageViolation,
    field: string,
    path: string
  ) {
    super('ILLEGAL_ARRAY_USAGE', arrayUsageMessage(violation, value, field), [path], `"${variable}" is an array parameter`)
    this.name = 'IllegalArrayUsageError'
  }
}

function arrayUsageMessage(violation: ArrayUsageViolation, value: string, field: string): string {
  return violation === 'prohibited'
    ? `variable type invalid in "${value}" for step ${field}`
    : `variable is not properly isolated in "${value}" for step ${field}`
}

export class MalformedDeclarationError extends SpecError {
  constructor(message: string, path: string, options?: {cause?: unknown}) {
    super('MALFORMED_DECLARATION', message, [path], undefined, options)
    this.name = 'MalformedDeclarationError'
  }
}

export class MissingFieldError extends SpecError {
  constructor(...paths: string[]) {
    super('MISSING_FIELD', 'missing field(s)', paths)
    this.name = 'MissingFieldError'
  }
}

export class InvalidValueError extends SpecError {
  constructor(value: string, path: string, details?: string, message = `invalid value: ${value}`) {
    super('INVALID_VALUE', message, [path], details)
    this.name = 'InvalidValueError'
  }
}

export class DuplicateNameError extends SpecError {
  constructor(
    readonly kind: string,
    readonly duplicate: string,
    path: string
  ) {
    super('DUPLICATE_NAME', `${kind} name "${duplicate}" must be unique`, [path])
    this.name = 'DuplicateNameError'
  }
}

export class MountPathConflictError extends SpecError {
  constructor(readonly mountPath: string, path: string) {
    super('MOUNT_PATH_CONFLICT', `workspace mount path "${mountPath}" must be unique`, [path])
    this.name = 'MountPathConflictError'
  }
}

export class ReservedVolumeMountError extends SpecError {
  constructor(message: string, path: string) {
    super('RESERVED_VOLUME_MOUNT', message, [path])
    this.name = 'ReservedVolumeMountError'
  }
}

export class TypeMismatchError extends SpecError {
  constructor(declaredType: string, defaultType: string, typePath: string, defaultPath: string) {
    super(
      'TYPE_MISMATCH',
      `"${declaredType}" type does not match default value's type: "${defaultType}"`,
      [typePath, defaultPath]
    )
    this.name = 'TypeMismatchError'
  }
}

// -- Loader errors -----------------------------------------------------------

export class LoaderError extends TasklintError {
  constructor(code: string, message: string, options?: {cause?: unknown}) {
    super(code, message, options)
    this.name = 'LoaderError'
  }
}

export class DecodeError extends LoaderError {
  constructor(
    readonly path: string,
    message: string,
    options?: {cause?: unknown}
  ) {
    super('DECODE_ERROR', path ? `${path}: ${message}` : message, options)
    this.name = 'DecodeError'
  }
}

/** Joins a parent field and a child locator; index segments attach without a dot. */
export function joinFieldPath(parent: string, child: string): string {
  if (!parent) {
    return child
  }

  if (!child) {
    return parent
  }

  return child.startsWith('[') ? `${parent}${child}` : `${parent}.${child}`
}
