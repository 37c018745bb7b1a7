import type { Stats } from 'node:fs'
import * as fs from 'node:fs/promises'
import * as path from 'node:path'
import type { DirectoryEntry } from './types.js'

export const DEFAULT_MAX_FILE_SIZE = 1024 * 1024

/**
 * Bytes inspected when deciding whether a file is binary.
 */
const BINARY_PROBE_LENGTH = 512

/**
 * Failure of a file-system operation. The message is what the model sees.
 */
export class FileSystemError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'FileSystemError'
  }
}

const INVALID_PATH = 'Invalid path or path is outside working directory'

/**
 * File operations confined to a single root directory.
 */
export class Workspace {
  readonly root: string
  private readonly _maxFileSize: number

  constructor(root: string, maxFileSize: number = DEFAULT_MAX_FILE_SIZE) {
    this.root = path.resolve(root)
    this._maxFileSize = maxFileSize
  }

  /**
   * Resolves a path relative to the root, rejecting anything that lands
   * outside of it.
   */
  resolve(relativePath: string): string {
    if (relativePath.includes('\0')) {
      throw new FileSystemError(INVALID_PATH)
    }
    const absolutePath = path.resolve(this.root, relativePath)
    const fromRoot = path.relative(this.root, absolutePath)
    if (fromRoot === '..' || fromRoot.startsWith(`..${path.sep}`) || path.isAbsolute(fromRoot)) {
      throw new FileSystemError(INVALID_PATH)
    }
    return absolutePath
  }

  async listDirectory(relativePath: string): Promise<DirectoryEntry[]> {
    const directory = this.resolve(relativePath)
    const stats = await statOrUndefined(directory)
    if (stats === undefined) {
      throw new FileSystemError('Directory not found')
    }
    if (!stats.isDirectory()) {
      throw new FileSystemError('Path is not a directory')
    }

    const dirents = await fs.readdir(directory, { withFileTypes: true })
    dirents.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))

    const entries: DirectoryEntry[] = []
    for (const dirent of dirents) {
      if (dirent.isDirectory()) {
        entries.push({ name: dirent.name, isDirectory: true })
      } else {
        const entryStats = await fs.lstat(path.join(directory, dirent.name))
        entries.push({ name: dirent.name, isDirectory: false, size: entryStats.size })
      }
    }
    return entries
  }

  async readTextFile(relativePath: string): Promise<string> {
    const filePath = this.resolve(relativePath)
    const stats = await statOrUndefined(filePath)
    if (stats === undefined) {
      throw new FileSystemError('File not found')
    }
    if (stats.isDirectory()) {
      throw new FileSystemError('Path is a directory')
    }
    if (stats.size > this._maxFileSize) {
      throw new FileSystemError(`File is too large (${stats.size} bytes, limit ${this._maxFileSize} bytes)`)
    }

    const content = await fs.readFile(filePath)
    if (isBinary(content)) {
      throw new FileSystemError('Binary files are not supported. Only text files can be read.')
    }
    return content.toString('utf8')
  }

  /**
   * Like {@link readTextFile} but returns undefined for files that cannot be
   * read as text instead of failing.
   */
  async tryReadTextFile(relativePath: string): Promise<string | undefined> {
    const filePath = this.resolve(relativePath)
    const stats = await statOrUndefined(filePath)
    if (stats === undefined || !stats.isFile() || stats.size > this._maxFileSize) {
      return undefined
    }
    const content = await fs.readFile(filePath)
    return isBinary(content) ? undefined : content.toString('utf8')
  }

  async createFile(relativePath: string, content: string): Promise<void> {
    const filePath = this.resolve(relativePath)
    await fs.mkdir(path.dirname(filePath), { recursive: true })
    try {
      await fs.writeFile(filePath, content, { encoding: 'utf8', flag: 'wx' })
    } catch (error) {
      if (hasErrorCode(error, 'EEXIST')) {
        throw new FileSystemError('File already exists', { cause: error })
      }
      throw error
    }
  }

  async writeFile(relativePath: string, content: string): Promise<void> {
    const filePath = this.resolve(relativePath)
    const stats = await statOrUndefined(filePath)
    if (stats?.isDirectory()) {
      throw new FileSystemError('Path is a directory')
    }
    await fs.mkdir(path.dirname(filePath), { recursive: true })
    await fs.writeFile(filePath, content, 'utf8')
  }
}

/**
 * Converts a shell-style file name pattern (`*`, `?`) into an anchored
 * regular expression.
 */
export function globToRegExp(pattern: string): RegExp {
  let source = ''
  for (const char of pattern) {
    if (char === '*') source += '.*'
    else if (char === '?') source += '.'
    else source += char.replace(/[.+^${}()|[\]\\]/g, '\\$&')
  }
  return new RegExp(`^${source}$`)
}

function isBinary(content: Buffer): boolean {
  return content.subarray(0, BINARY_PROBE_LENGTH).includes(0)
}

async function statOrUndefined(filePath: string): Promise<Stats | undefined> {
  try {
    return await fs.stat(filePath)
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT') || hasErrorCode(error, 'ENOTDIR')) {
      return undefined
    }
    throw error
  }
}

function hasErrorCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code
}
