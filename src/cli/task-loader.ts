import {readFile} from 'node:fs/promises'
import {extname} from 'node:path'
import {parse as parseYaml} from 'yaml'
import {LoaderError} from '../errors.js'
import type {Task} from '../types.js'
import {decodeTask} from './task-decoder.js'

export class TaskLoader {
  async load(filePath: string): Promise<Task> {
    let content: string
    try {
      content = await readFile(filePath, 'utf8')
    } catch (error: unknown) {
      throw new LoaderError('READ_FAILED', `Cannot read task file ${filePath}`, {cause: error})
    }

    return this.parse(content, filePath)
  }

  parse(content: string, filePath: string): Task {
    return decodeTask(parseTaskFile(content, filePath))
  }
}

/** Parses YAML for `.yaml`/`.yml` files, JSON otherwise. */
export function parseTaskFile(content: string, filePath: string): unknown {
  const ext = extname(filePath).toLowerCase()
  try {
    if (ext === '.yaml' || ext === '.yml') {
      return parseYaml(content)
    }

    return JSON.parse(content)
  } catch (error: unknown) {
    const reason = error instanceof Error ? error.message : String(error)
    throw new LoaderError('PARSE_FAILED', `Cannot parse task file ${filePath}: ${reason}`, {cause: error})
  }
}
