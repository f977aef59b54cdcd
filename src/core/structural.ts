import {posix} from 'node:path'
import {
  DuplicateNameError,
  InvalidValueError,
  MissingFieldError,
  MountPathConflictError,
  ReservedVolumeMountError,
  TypeMismatchError,
  type SpecError
} from '../errors.js'
import {
  isParamType,
  isResourceType,
  type ObjectMetadata,
  type ParamSpec,
  type Step,
  type StepTemplate,
  type TaskResource,
  type TaskResources,
  type Volume,
  type WorkspaceDeclaration
} from '../types.js'
import {DEFAULT_WORKSPACE_ROOT} from './context.js'

const DNS1123_LABEL = /^[a-z\d]([-a-z\d]*[a-z\d])?$/
const DNS1123_LABEL_MAX_LENGTH = 63
const MAX_NAME_LENGTH = 63

const RESERVED_MOUNT_PREFIX = '/tekton/'
const ALLOWED_RESERVED_MOUNT_PREFIX = '/tekton/home'
const RESERVED_VOLUME_PREFIX = 'tekton-internal-'

export function validateObjectMetadata(metadata: ObjectMetadata | undefined): SpecError | undefined {
  const name = metadata?.name
  if (!name) {
    return new MissingFieldError('metadata.name')
  }

  if (name.length > MAX_NAME_LENGTH) {
    return new InvalidValueError(name, 'metadata.name', `name must be no more than ${MAX_NAME_LENGTH} characters long`)
  }

  if (name.includes('.')) {
    return new InvalidValueError(name, 'metadata.name', 'special character . must not be present')
  }

  return undefined
}

export function validateVolumes(volumes: readonly Volume[] = []): SpecError | undefined {
  const seen = new Set<string>()
  for (const [i, volume] of volumes.entries()) {
    if (seen.has(volume.name)) {
      return new DuplicateNameError('volume', volume.name, `volumes[${i}].name`)
    }

    seen.add(volume.name)
  }

  return undefined
}

/**
 * Workspace names must be unique, and their mount paths must not collide with
 * each other or with the volume mounts of the steps and the step template.
 */
export function validateDeclaredWorkspaces(
  workspaces: readonly WorkspaceDeclaration[] = [],
  steps: readonly Step[] = [],
  stepTemplate?: StepTemplate,
  workspaceRoot = DEFAULT_WORKSPACE_ROOT
): SpecError | undefined {
  const mountPaths = new Set<string>()
  for (const container of [...steps, ...(stepTemplate ? [stepTemplate] : [])]) {
    for (const mount of container.volumeMounts ?? []) {
      mountPaths.add(cleanPath(mount.mountPath))
    }
  }

  const names = new Set<string>()
  for (const [i, workspace] of workspaces.entries()) {
    if (names.has(workspace.name)) {
      return new DuplicateNameError('workspace', workspace.name, `workspaces[${i}].name`)
    }

    names.add(workspace.name)

    const mountPath = cleanPath(workspace.mountPath || posix.join(workspaceRoot, workspace.name))
    if (mountPaths.has(mountPath)) {
      return new MountPathConflictError(mountPath, `workspaces[${i}].mountPath`)
    }

    mountPaths.add(mountPath)
  }

  return undefined
}

/** Checks steps after the step template has been merged in. */
export function validateSteps(steps: readonly Step[]): SpecError | undefined {
  const names = new Set<string>()
  for (const [i, step] of steps.entries()) {
    if (!step.image) {
      return new MissingFieldError(`steps[${i}].image`)
    }

    if (step.script && step.command && step.command.length > 0) {
      return new InvalidValueError(step.script, `steps[${i}].script`, undefined, `step ${i} script cannot be used with command`)
    }

    if (step.name) {
      if (names.has(step.name)) {
        return new DuplicateNameError('step', step.name, `steps[${i}].name`)
      }

      names.add(step.name)
    }

    for (const [j, mount] of (step.volumeMounts ?? []).entries()) {
      if (mount.mountPath.startsWith(RESERVED_MOUNT_PREFIX) && !mount.mountPath.startsWith(ALLOWED_RESERVED_MOUNT_PREFIX)) {
        return new ReservedVolumeMountError(
          `step ${i} volumeMount cannot be mounted under ${RESERVED_MOUNT_PREFIX} (volumeMount "${mount.name}" mounted at "${mount.mountPath}")`,
          `steps[${i}].volumeMounts[${j}].mountPath`
        )
      }

      if (mount.name.startsWith(RESERVED_VOLUME_PREFIX)) {
        return new ReservedVolumeMountError(
          `step ${i} volumeMount name "${mount.name}" cannot start with "${RESERVED_VOLUME_PREFIX}"`,
          `steps[${i}].volumeMounts[${j}].name`
        )
      }
    }
  }

  return undefined
}

export function validateResources(resources: TaskResources | undefined): SpecError | undefined {
  return validateResourceList(resources?.inputs ?? [], 'resources.inputs')
    ?? validateResourceList(resources?.outputs ?? [], 'resources.outputs')
}

function validateResourceList(resources: readonly TaskResource[], path: string): SpecError | undefined {
  const names = new Set<string>()
  for (const [i, resource] of resources.entries()) {
    if (names.has(resource.name)) {
      return new DuplicateNameError('resource', resource.name, `${path}[${i}].name`)
    }

    names.add(resource.name)

    if (!resource.type) {
      return new MissingFieldError(`${path}[${i}].type`)
    }

    if (!isResourceType(resource.type)) {
      return new InvalidValueError(resource.type, `${path}[${i}].type`)
    }
  }

  return undefined
}

export function validateParameterTypes(params: readonly ParamSpec[] = []): SpecError | undefined {
  for (const [i, param] of params.entries()) {
    const type = param.type ?? 'string'
    if (!isParamType(type)) {
      return new InvalidValueError(type, `params[${i}].type`)
    }

    if (param.default !== undefined) {
      const defaultType = Array.isArray(param.default) ? 'array' : 'string'
      if (defaultType !== type) {
        return new TypeMismatchError(type, defaultType, `params[${i}].type`, `params[${i}].default`)
      }
    }
  }

  return undefined
}

export function validateStepNames(steps: readonly Step[]): SpecError | undefined {
  for (const [i, step] of steps.entries()) {
    if (step.name && !isDns1123Label(step.name)) {
      return new InvalidValueError(
        step.name,
        `steps[${i}].name`,
        'Task step name must be a valid DNS Label, For more info refer to https://kubernetes.io/docs/concepts/overview/working-with-objects/names/#names',
        `invalid value "${step.name}"`
      )
    }
  }

  return undefined
}

export function isDns1123Label(value: string): boolean {
  return value.length <= DNS1123_LABEL_MAX_LENGTH && DNS1123_LABEL.test(value)
}

/** Lexically cleaned path without a trailing slash, `/` kept as is. */
export function cleanPath(path: string): string {
  const normalized = posix.normalize(path)
  return normalized.length > 1 && normalized.endsWith('/') ? normalized.slice(0, -1) : normalized
}
