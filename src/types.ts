// ---------------------------------------------------------------------------
// Task specification domain types.
//
// These mirror a decoded task document. Enumerated fields (parameter and
// resource types) stay plain strings here: enumeration is checked by the
// structural validators, not by decoding.
// ---------------------------------------------------------------------------

// -- Generic JSON ------------------------------------------------------------

export type JsonPrimitive = string | number | boolean | null
export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject
export type JsonObject = {[key: string]: JsonValue}

// -- Declarations ------------------------------------------------------------

export const PARAM_TYPES = ['string', 'array'] as const
export type ParamType = typeof PARAM_TYPES[number]

export const RESOURCE_TYPES = ['git', 'image', 'cluster', 'storage', 'pullrequest', 'cloudevent'] as const
export type ResourceType = typeof RESOURCE_TYPES[number]

/** A parameter default: a single string or, for array parameters, a list of strings. */
export type ParamValue = string | string[]

export type ParamSpec = {
  name: string;
  /** One of {@link PARAM_TYPES}; `string` when absent. */
  type?: string;
  description?: string;
  default?: ParamValue;
}

export type WorkspaceDeclaration = {
  name: string;
  description?: string;
  /** Defaults to `/workspace/<name>`. */
  mountPath?: string;
  readOnly?: boolean;
}

export type TaskResource = {
  name: string;
  /** One of {@link RESOURCE_TYPES}. */
  type?: string;
  description?: string;
  /** Absolute, or relative to `/workspace`. */
  targetPath?: string;
  optional?: boolean;
}

export type TaskResources = {
  inputs?: TaskResource[];
  outputs?: TaskResource[];
}

export type TaskResult = {
  name: string;
  description?: string;
  /** Defaults to `/tekton/results/<name>`. */
  path?: string;
}

// -- Steps -------------------------------------------------------------------

export type EnvVar = {
  name: string;
  value?: string;
}

export type VolumeMount = {
  name: string;
  mountPath: string;
  subPath?: string;
  readOnly?: boolean;
}

/** Container fields shared by steps and the step template. */
export type StepTemplate = {
  image?: string;
  workingDir?: string;
  command?: string[];
  args?: string[];
  env?: EnvVar[];
  volumeMounts?: VolumeMount[];
}

export type Step = StepTemplate & {
  name?: string;
  /** Inline script; mutually exclusive with `command`. */
  script?: string;
}

/** A pod volume. Everything but the name is an opaque volume source. */
export type Volume = {
  name: string;
  [source: string]: JsonValue;
}

// -- Task --------------------------------------------------------------------

export type TaskSpec = {
  description?: string;
  params?: ParamSpec[];
  workspaces?: WorkspaceDeclaration[];
  resources?: TaskResources;
  results?: TaskResult[];
  steps?: Step[];
  stepTemplate?: StepTemplate;
  volumes?: Volume[];
}

export type ObjectMetadata = {
  name?: string;
  labels?: Record<string, string>;
  annotations?: Record<string, string>;
}

export type Task = {
  apiVersion?: string;
  kind?: string;
  metadata: ObjectMetadata;
  spec: TaskSpec;
}

/** Effective-path roots of the lookup context. */
export type ContextOptions = {
  /** Root for workspaces and resources (default: "/workspace"). */
  workspaceRoot?: string;
  /** Root for results (default: "/tekton/results"). */
  resultsRoot?: string;
}

export function isParamType(type: string): type is ParamType {
  return PARAM_TYPES.some(known => known === type)
}

export function isResourceType(type: string): type is ResourceType {
  return RESOURCE_TYPES.some(known => known === type)
}
