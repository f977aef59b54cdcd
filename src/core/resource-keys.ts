import {isResourceType, type ResourceType} from '../types.js'

/**
 * Placeholder keys each resource type exposes in the lookup context, on top
 * of `path`, `name` and `type`. Adding a resource type is one entry here.
 */
export const RESOURCE_PLACEHOLDER_KEYS: Readonly<Record<ResourceType, readonly string[]>> = {
  git: ['url', 'revision', 'depth', 'sslVerify'],
  image: ['url', 'digest'],
  cluster: ['url', 'revision', 'username', 'password', 'namespace', 'token', 'insecure', 'cadata'],
  storage: ['location'],
  pullrequest: ['url', 'provider', 'insecure-skip-tls-verify'],
  cloudevent: ['target-uri']
}

/** Placeholder keys for `type`; none when the type is absent or unknown. */
export function resourcePlaceholderKeys(type: string | undefined): readonly string[] {
  if (type === undefined || !isResourceType(type)) {
    return []
  }

  return RESOURCE_PLACEHOLDER_KEYS[type]
}
