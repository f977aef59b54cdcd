import {DecodeError, MalformedDeclarationError, joinFieldPath} from '../errors.js'
import {toJsonTree} from '../substitution/json-tree.js'
import type {
  EnvVar,
  JsonObject,
  ObjectMetadata,
  ParamSpec,
  ParamValue,
  Step,
  StepTemplate,
  Task,
  TaskResource,
  TaskResources,
  TaskResult,
  TaskSpec,
  Volume,
  VolumeMount,
  WorkspaceDeclaration
} from '../types.js'

type RawObject = Record<string, unknown>

/**
 * Decodes a parsed task document into a typed {@link Task}.
 *
 * Only shapes are checked here; names, enumerations and references are the
 * validator's job. Unknown keys are ignored.
 */
export function decodeTask(raw: unknown): Task {
  const document = expectObject(raw, '')

  const kind = optionalString(document.kind, 'kind')
  if (kind !== undefined && kind !== 'Task') {
    throw new DecodeError('kind', `unsupported kind "${kind}", expected "Task"`)
  }

  if (document.spec === undefined) {
    throw new DecodeError('spec', 'is required')
  }

  return {
    apiVersion: optionalString(document.apiVersion, 'apiVersion'),
    kind,
    metadata: decodeMetadata(document.metadata, 'metadata'),
    spec: decodeTaskSpec(document.spec, 'spec')
  }
}

export function decodeTaskSpec(raw: unknown, path = ''): TaskSpec {
  const spec = expectObject(raw, path)
  const at = (field: string) => joinFieldPath(path, field)

  return {
    description: optionalString(spec.description, at('description')),
    params: optionalList(spec.params, at('params'), decodeParam),
    workspaces: optionalList(spec.workspaces, at('workspaces'), decodeWorkspace),
    resources: spec.resources === undefined ? undefined : decodeResources(spec.resources, at('resources')),
    results: optionalList(spec.results, at('results'), decodeResult),
    steps: optionalList(spec.steps, at('steps'), decodeStep),
    stepTemplate: spec.stepTemplate === undefined ? undefined : decodeStepTemplate(spec.stepTemplate, at('stepTemplate')),
    volumes: optionalList(spec.volumes, at('volumes'), decodeVolume)
  }
}

function decodeMetadata(raw: unknown, path: string): ObjectMetadata {
  if (raw === undefined) {
    return {}
  }

  const metadata = expectObject(raw, path)
  return {
    name: optionalString(metadata.name, joinFieldPath(path, 'name')),
    labels: optionalStringRecord(metadata.labels, joinFieldPath(path, 'labels')),
    annotations: optionalStringRecord(metadata.annotations, joinFieldPath(path, 'annotations'))
  }
}

function decodeParam(raw: unknown, path: string): ParamSpec {
  const param = expectObject(raw, path)
  return {
    name: expectString(param.name, joinFieldPath(path, 'name')),
    type: optionalString(param.type, joinFieldPath(path, 'type')),
    description: optionalString(param.description, joinFieldPath(path, 'description')),
    default: decodeParamValue(param.default, joinFieldPath(path, 'default'))
  }
}

function decodeParamValue(raw: unknown, path: string): ParamValue | undefined {
  if (raw === undefined || typeof raw === 'string') {
    return raw
  }

  if (Array.isArray(raw)) {
    return raw.map((item, index) => expectString(item, joinFieldPath(path, `[${index}]`)))
  }

  throw new DecodeError(path, 'must be a string or a list of strings')
}

function decodeWorkspace(raw: unknown, path: string): WorkspaceDeclaration {
  const workspace = expectObject(raw, path)
  return {
    name: expectString(workspace.name, joinFieldPath(path, 'name')),
    description: optionalString(workspace.description, joinFieldPath(path, 'description')),
    mountPath: optionalString(workspace.mountPath, joinFieldPath(path, 'mountPath')),
    readOnly: optionalBoolean(workspace.readOnly, joinFieldPath(path, 'readOnly'))
  }
}

function decodeResources(raw: unknown, path: string): TaskResources {
  const resources = expectObject(raw, path)
  return {
    inputs: optionalList(resources.inputs, joinFieldPath(path, 'inputs'), decodeResource),
    outputs: optionalList(resources.outputs, joinFieldPath(path, 'outputs'), decodeResource)
  }
}

function decodeResource(raw: unknown, path: string): TaskResource {
  const resource = expectObject(raw, path)
  return {
    name: expectString(resource.name, joinFieldPath(path, 'name')),
    type: optionalString(resource.type, joinFieldPath(path, 'type')),
    description: optionalString(resource.description, joinFieldPath(path, 'description')),
    targetPath: optionalString(resource.targetPath, joinFieldPath(path, 'targetPath')),
    optional: optionalBoolean(resource.optional, joinFieldPath(path, 'optional'))
  }
}

function decodeResult(raw: unknown, path: string): TaskResult {
  const result = expectObject(raw, path)
  return {
    name: expectString(result.name, joinFieldPath(path, 'name')),
    description: optionalString(result.description, joinFieldPath(path, 'description')),
    path: optionalString(result.path, joinFieldPath(path, 'path'))
  }
}

function decodeStepTemplate(raw: unknown, path: string): StepTemplate {
  const template = expectObject(raw, path)
  const at = (field: string) => joinFieldPath(path, field)

  return {
    image: optionalString(template.image, at('image')),
    workingDir: optionalString(template.workingDir, at('workingDir')),
    command: optionalStringList(template.command, at('command')),
    args: optionalStringList(template.args, at('args')),
    env: optionalList(template.env, at('env'), decodeEnvVar),
    volumeMounts: optionalList(template.volumeMounts, at('volumeMounts'), decodeVolumeMount)
  }
}

function decodeStep(raw: unknown, path: string): Step {
  const step = expectObject(raw, path)
  return {
    ...decodeStepTemplate(step, path),
    name: optionalString(step.name, joinFieldPath(path, 'name')),
    script: optionalString(step.script, joinFieldPath(path, 'script'))
  }
}

function decodeEnvVar(raw: unknown, path: string): EnvVar {
  const env = expectObject(raw, path)
  return {
    name: expectString(env.name, joinFieldPath(path, 'name')),
    value: optionalString(env.value, joinFieldPath(path, 'value'))
  }
}

function decodeVolumeMount(raw: unknown, path: string): VolumeMount {
  const mount = expectObject(raw, path)
  return {
    name: expectString(mount.name, joinFieldPath(path, 'name')),
    mountPath: expectString(mount.mountPath, joinFieldPath(path, 'mountPath')),
    subPath: optionalString(mount.subPath, joinFieldPath(path, 'subPath')),
    readOnly: optionalBoolean(mount.readOnly, joinFieldPath(path, 'readOnly'))
  }
}

function decodeVolume(raw: unknown, path: string): Volume {
  const {name, ...source} = expectObject(raw, path)
  return {
    ...decodeJsonObject(source, path),
    name: expectString(name, joinFieldPath(path, 'name'))
  }
}

// -- Primitives --------------------------------------------------------------

function isRawObject(value: unknown): value is RawObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function expectObject(value: unknown, path: string): RawObject {
  if (!isRawObject(value)) {
    throw new DecodeError(path, 'must be an object')
  }

  return value
}

function expectString(value: unknown, path: string): string {
  if (typeof value !== 'string') {
    throw new DecodeError(path, value === undefined ? 'is required' : 'must be a string')
  }

  return value
}

function optionalString(value: unknown, path: string): string | undefined {
  return value === undefined ? undefined : expectString(value, path)
}

function optionalBoolean(value: unknown, path: string): boolean | undefined {
  if (value === undefined || typeof value === 'boolean') {
    return value
  }

  throw new DecodeError(path, 'must be a boolean')
}

function optionalList<T>(value: unknown, path: string, decodeItem: (item: unknown, path: string) => T): T[] | undefined {
  if (value === undefined) {
    return undefined
  }

  if (!Array.isArray(value)) {
    throw new DecodeError(path, 'must be a list')
  }

  return value.map((item, index) => decodeItem(item, joinFieldPath(path, `[${index}]`)))
}

function optionalStringList(value: unknown, path: string): string[] | undefined {
  return optionalList(value, path, expectString)
}

function optionalStringRecord(value: unknown, path: string): Record<string, string> | undefined {
  if (value === undefined) {
    return undefined
  }

  const record: Record<string, string> = {}
  for (const [key, item] of Object.entries(expectObject(value, path))) {
    record[key] = expectString(item, joinFieldPath(path, key))
  }

  return record
}

function decodeJsonObject(value: RawObject, path: string): JsonObject {
  const tree: JsonObject = {}
  for (const [key, item] of Object.entries(value)) {
    try {
      tree[key] = toJsonTree(item, joinFieldPath(path, key))
    } catch (error: unknown) {
      if (error instanceof MalformedDeclarationError) {
        throw new DecodeError(error.paths[0], error.message, {cause: error})
      }

      throw error
    }
  }

  return tree
}
