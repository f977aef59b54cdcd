import type {ParamSpec} from '../types.js'

export type ParameterCatalog = {
  /** Every declared parameter name. */
  names: Set<string>;
  /** Names of the parameters declared with type `array`. */
  arrayNames: Set<string>;
}

export function catalogParameters(params: readonly ParamSpec[] = []): ParameterCatalog {
  const names = new Set<string>()
  const arrayNames = new Set<string>()

  for (const param of params) {
    names.add(param.name)
    if (param.type === 'array') {
      arrayNames.add(param.name)
    }
  }

  return {names, arrayNames}
}
