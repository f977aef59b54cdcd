export {validateTask, validateTaskSpec} from './task-validator.js'
export {validateExpansion} from './expansion.js'
export {
  validateArrayUsage,
  validateParameterUsage,
  checkArrayIsolation,
  policyFields
} from './field-policy.js'
export type {FieldPolicy, PolicyField} from './field-policy.js'
export {catalogParameters} from './catalog.js'
export type {ParameterCatalog} from './catalog.js'
export {
  buildTaskContext,
  buildLookupTree,
  toLookupTree,
  resourcePath,
  DEFAULT_WORKSPACE_ROOT,
  DEFAULT_RESULTS_ROOT
} from './context.js'
export type {
  TaskContext,
  ContextEntry,
  ParamEntry,
  ScalarEntry,
  ArrayEntry,
  WorkspaceEntry,
  ResourceEntry,
  ResourceDirection,
  ResultEntry
} from './context.js'
export {RESOURCE_PLACEHOLDER_KEYS, resourcePlaceholderKeys} from './resource-keys.js'
export {mergeStepsWithStepTemplate} from './step-template.js'
export {
  validateObjectMetadata,
  validateVolumes,
  validateDeclaredWorkspaces,
  validateSteps,
  validateResources,
  validateParameterTypes,
  validateStepNames,
  isDns1123Label,
  cleanPath
} from './structural.js'
