export {expand, resolveReference, isJsonObject} from './expand.js'
export {toJsonTree} from './json-tree.js'
export {
  PARAM_PREFIXES,
  placeholderPattern,
  extractReferences,
  referencedNames,
  findReferencedName,
  isIsolatedReference
} from './variables.js'
