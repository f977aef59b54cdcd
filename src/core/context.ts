import {posix} from 'node:path'
import {MalformedDeclarationError} from '../errors.js'
import {
  isResourceType,
  type ContextOptions,
  type JsonObject,
  type JsonValue,
  type ParamSpec,
  type ResourceType,
  type TaskResource,
  type TaskResult,
  type TaskSpec,
  type WorkspaceDeclaration
} from '../types.js'
import {resourcePlaceholderKeys} from './resource-keys.js'

export const DEFAULT_WORKSPACE_ROOT = '/workspace'
export const DEFAULT_RESULTS_ROOT = '/tekton/results'

// -- Entries -----------------------------------------------------------------

export type ScalarEntry = {
  kind: 'scalar';
  name: string;
  value: string;
}

export type ArrayEntry = {
  kind: 'array';
  name: string;
  value: string[];
}

export type ParamEntry = ScalarEntry | ArrayEntry

export type WorkspaceEntry = {
  kind: 'workspace';
  name: string;
  path: string;
}

export type ResourceDirection = 'input' | 'output'

export type ResourceEntry = {
  kind: 'resource';
  name: string;
  direction: ResourceDirection;
  path: string;
  /** Absent when the declared type is missing or unknown. */
  resourceType?: ResourceType;
  /** Type-specific keys, all empty: only their presence matters before execution. */
  placeholders: Record<string, string>;
}

export type ResultEntry = {
  kind: 'result';
  name: string;
  path: string;
}

export type ContextEntry = ParamEntry | WorkspaceEntry | ResourceEntry | ResultEntry

/**
 * Everything a task's placeholders may refer to, in declaration order.
 * Later declarations with a duplicate name shadow earlier ones in the lookup tree.
 */
export type TaskContext = {
  params: ParamEntry[];
  workspaces: WorkspaceEntry[];
  resources: {
    inputs: ResourceEntry[];
    outputs: ResourceEntry[];
  };
  results: ResultEntry[];
}

// -- Building ----------------------------------------------------------------

/**
 * Builds the validation-time context of a task from its declarations.
 *
 * @throws {MalformedDeclarationError} when a parameter default is neither a
 * string nor a list of strings.
 */
export function buildTaskContext(spec: TaskSpec, options: ContextOptions = {}): TaskContext {
  const workspaceRoot = options.workspaceRoot ?? DEFAULT_WORKSPACE_ROOT
  const resultsRoot = options.resultsRoot ?? DEFAULT_RESULTS_ROOT

  return {
    params: (spec.params ?? []).map((param, index) => paramEntry(param, index)),
    workspaces: (spec.workspaces ?? []).map(workspace => workspaceEntry(workspace, workspaceRoot)),
    resources: {
      inputs: (spec.resources?.inputs ?? []).map(resource => resourceEntry(resource, 'input', workspaceRoot)),
      outputs: (spec.resources?.outputs ?? []).map(resource => resourceEntry(resource, 'output', workspaceRoot))
    },
    results: (spec.results ?? []).map(result => resultEntry(result, resultsRoot))
  }
}

function paramEntry(param: ParamSpec, index: number): ParamEntry {
  const {name, default: defaultValue} = param

  if (defaultValue === undefined) {
    return param.type === 'array'
      ? {kind: 'array', name, value: []}
      : {kind: 'scalar', name, value: ''}
  }

  if (typeof defaultValue === 'string') {
    return {kind: 'scalar', name, value: defaultValue}
  }

  if (Array.isArray(defaultValue) && defaultValue.every(item => typeof item === 'string')) {
    return {kind: 'array', name, value: [...defaultValue]}
  }

  throw new MalformedDeclarationError(
    `parameter "${name}" default must be a string or a list of strings`,
    `params[${index}].default`
  )
}

function workspaceEntry(workspace: WorkspaceDeclaration, root: string): WorkspaceEntry {
  return {
    kind: 'workspace',
    name: workspace.name,
    path: workspace.mountPath || posix.join(root, workspace.name)
  }
}

export function resourcePath(resource: TaskResource, direction: ResourceDirection, root: string = DEFAULT_WORKSPACE_ROOT): string {
  const {targetPath} = resource
  if (targetPath) {
    return posix.isAbsolute(targetPath) ? targetPath : posix.join(root, targetPath)
  }

  return direction === 'output'
    ? posix.join(root, 'output', resource.name)
    : posix.join(root, resource.name)
}

function resourceEntry(resource: TaskResource, direction: ResourceDirection, root: string): ResourceEntry {
  const placeholders: Record<string, string> = {}
  for (const key of resourcePlaceholderKeys(resource.type)) {
    placeholders[key] = ''
  }

  const entry: ResourceEntry = {
    kind: 'resource',
    name: resource.name,
    direction,
    path: resourcePath(resource, direction, root),
    placeholders
  }

  if (resource.type !== undefined && isResourceType(resource.type)) {
    entry.resourceType = resource.type
  }

  return entry
}

function resultEntry(result: TaskResult, root: string): ResultEntry {
  return {
    kind: 'result',
    name: result.name,
    path: result.path || posix.join(root, result.name)
  }
}

// -- Lookup tree -------------------------------------------------------------

/**
 * Projects a context into the nested mapping placeholders are resolved
 * against: `params`, `workspaces`, `resources.inputs`, `resources.outputs`,
 * `results`, plus the legacy `inputs.params`, `inputs.resources` and
 * `outputs.resources` aliases.
 */
export function toLookupTree(context: TaskContext): JsonObject {
  const params: JsonObject = {}
  for (const entry of context.params) {
    setOwn(params, entry.name, entry.kind === 'array' ? [...entry.value] : entry.value)
  }

  const workspaces: JsonObject = {}
  for (const entry of context.workspaces) {
    setOwn(workspaces, entry.name, {path: entry.path})
  }

  const inputs = resourcesTree(context.resources.inputs)
  const outputs = resourcesTree(context.resources.outputs)

  const results: JsonObject = {}
  for (const entry of context.results) {
    setOwn(results, entry.name, {path: entry.path})
  }

  return {
    params,
    workspaces,
    resources: {inputs, outputs},
    results,
    inputs: {params, resources: inputs},
    outputs: {resources: outputs}
  }
}

function resourcesTree(entries: ResourceEntry[]): JsonObject {
  const tree: JsonObject = {}
  for (const entry of entries) {
    const resource: JsonObject = {path: entry.path, name: entry.name}
    if (entry.resourceType) {
      resource.type = entry.resourceType
    }

    setOwn(tree, entry.name, {...resource, ...entry.placeholders})
  }

  return tree
}

/** Own-key assignment, so declared names such as `__proto__` stay plain keys. */
function setOwn(tree: JsonObject, key: string, value: JsonValue): void {
  Object.defineProperty(tree, key, {value, enumerable: true, writable: true, configurable: true})
}

/** Shorthand for `toLookupTree(buildTaskContext(spec, options))`. */
export function buildLookupTree(spec: TaskSpec, options?: ContextOptions): JsonObject {
  return toLookupTree(buildTaskContext(spec, options))
}
