/**
 * Library entry point.
 *
 * Validates the `$(...)` variable references of a task before it runs: every
 * reference must resolve against the task's declarations, and array
 * parameters may only be spliced in as whole `command`/`args` entries.
 *
 * For CLI usage, see src/cli/index.ts
 *
 * @example
 * ```typescript
 * import {validateTask} from 'tasklint'
 *
 * const error = validateTask({
 *   metadata: {name: 'build'},
 *   spec: {
 *     params: [{name: 'flags', type: 'array'}],
 *     steps: [{image: 'alpine', command: ['make', '$(params.flags)']}]
 *   }
 * })
 *
 * if (error) {
 *   console.error(error.describe())
 * }
 * ```
 */

export {
  validateTask,
  validateTaskSpec,
  validateExpansion,
  validateArrayUsage,
  validateParameterUsage,
  checkArrayIsolation,
  policyFields,
  catalogParameters,
  buildTaskContext,
  buildLookupTree,
  toLookupTree,
  resourcePath,
  RESOURCE_PLACEHOLDER_KEYS,
  resourcePlaceholderKeys,
  mergeStepsWithStepTemplate,
  validateObjectMetadata,
  validateVolumes,
  validateDeclaredWorkspaces,
  validateSteps,
  validateResources,
  validateParameterTypes,
  validateStepNames,
  DEFAULT_WORKSPACE_ROOT,
  DEFAULT_RESULTS_ROOT,
  type FieldPolicy,
  type PolicyField,
  type ParameterCatalog,
  type TaskContext,
  type ContextEntry,
  type ParamEntry,
  type ScalarEntry,
  type ArrayEntry,
  type WorkspaceEntry,
  type ResourceEntry,
  type ResourceDirection,
  type ResultEntry
} from './core/index.js'

export {
  expand,
  toJsonTree,
  extractReferences,
  referencedNames,
  findReferencedName,
  isIsolatedReference,
  PARAM_PREFIXES
} from './substitution/index.js'

export {TaskLoader, parseTaskFile} from './cli/task-loader.js'
export {decodeTask, decodeTaskSpec} from './cli/task-decoder.js'

export {
  TasklintError,
  SpecError,
  UndefinedReferenceError,
  IllegalArrayUsageError,
  MalformedDeclarationError,
  MissingFieldError,
  InvalidValueError,
  DuplicateNameError,
  MountPathConflictError,
  ReservedVolumeMountError,
  TypeMismatchError,
  LoaderError,
  DecodeError,
  type ArrayUsageViolation
} from './errors.js'

export * from './types.js'
