import {readFile} from 'node:fs/promises'
import {join} from 'node:path'
import {parse as parseYaml} from 'yaml'
import {DecodeError} from '../errors.js'
import type {ContextOptions} from '../types.js'

export const CONFIG_FILE = '.tasklint.yml'

export type TasklintConfig = {
  /** Use the structured JSON reporter by default. */
  json?: boolean;
  workspaceRoot?: string;
  resultsRoot?: string;
}

/**
 * Loads the project-level `.tasklint.yml` configuration from a directory.
 * Returns an empty config when the file does not exist.
 */
export async function loadConfig(dir: string): Promise<TasklintConfig> {
  let content: string
  try {
    content = await readFile(join(dir, CONFIG_FILE), 'utf8')
  } catch (error: unknown) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return {}
    }

    throw error
  }

  const parsed: unknown = parseYaml(content)
  if (parsed === null || parsed === undefined) {
    return {}
  }

  return decodeConfig(parsed)
}

function decodeConfig(raw: unknown): TasklintConfig {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new DecodeError(CONFIG_FILE, 'must be a mapping')
  }

  const config: TasklintConfig = {}
  for (const [key, value] of Object.entries(raw)) {
    switch (key) {
      case 'json': {
        if (typeof value !== 'boolean') {
          throw new DecodeError(`${CONFIG_FILE}#json`, 'must be a boolean')
        }

        config.json = value
        break
      }

      case 'workspaceRoot':
      case 'resultsRoot': {
        if (typeof value !== 'string' || !value.startsWith('/')) {
          throw new DecodeError(`${CONFIG_FILE}#${key}`, 'must be an absolute path')
        }

        config[key] = value
        break
      }

      default: {
        throw new DecodeError(`${CONFIG_FILE}#${key}`, 'unknown option')
      }
    }
  }

  return config
}

export function contextOptions(config: TasklintConfig): ContextOptions {
  return {workspaceRoot: config.workspaceRoot, resultsRoot: config.resultsRoot}
}
