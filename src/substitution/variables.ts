/** Dotted reference path: `params.foo`, `resources.inputs.repo.insecure-skip-tls-verify`. */
const REFERENCE_PATH = String.raw`[A-Za-z_][\w-]*(?:\.[\w-]+)*`

/** Prefixes under which parameters are reachable, current and legacy. */
export const PARAM_PREFIXES = ['params', 'inputs.params'] as const

/**
 * Returns a fresh global regex matching `$(<path>)` placeholders.
 * Capture group 1 is the dotted path.
 */
export function placeholderPattern(): RegExp {
  return new RegExp(String.raw`\$\((${REFERENCE_PATH})\)`, 'g')
}

const ISOLATED_PLACEHOLDER = new RegExp(String.raw`^\$\(${REFERENCE_PATH}\)$`)

/** All reference paths found in `value`, in order of appearance. */
export function extractReferences(value: string): string[] {
  return [...value.matchAll(placeholderPattern())].map(match => match[1])
}

/**
 * Names referenced under any of `prefixes`: `$(params.foo.bar)` yields `foo`.
 */
export function referencedNames(value: string, prefixes: readonly string[] = PARAM_PREFIXES): string[] {
  const names: string[] = []
  for (const reference of extractReferences(value)) {
    for (const prefix of prefixes) {
      if (reference.startsWith(`${prefix}.`)) {
        names.push(reference.slice(prefix.length + 1).split('.')[0])
        break
      }
    }
  }

  return names
}

/** First name of `names` referenced by `value`, if any. */
export function findReferencedName(
  value: string,
  names: ReadonlySet<string>,
  prefixes: readonly string[] = PARAM_PREFIXES
): string | undefined {
  return referencedNames(value, prefixes).find(name => names.has(name))
}

/** True when the whole value is exactly one placeholder, with nothing around it. */
export function isIsolatedReference(value: string): boolean {
  return ISOLATED_PLACEHOLDER.test(value)
}
