import { z } from 'zod'
import { tool } from '../../tools/zod-tool.js'
import type { Tool } from '../../tools/tool.js'
import { InvalidArgumentsError, normalizeError } from '../../errors.js'
import { createLogger } from '../../logging/logger.js'
import type { FileSystemToolsOptions } from './types.js'
import { FileSystemError, Workspace, globToRegExp } from './workspace.js'

const logger = createLogger('file-system')

const listDirectoryInputSchema = z.object({
  path: z
    .string()
    .default('.')
    .describe("The relative path of the directory to list. Defaults to the working directory ('.')."),
})

const readFileInputSchema = z.object({
  path: z.string().describe('The relative path of the file to read.'),
})

const writeInputSchema = z.object({
  path: z.string().describe('The relative path of the file.'),
  content: z.string().describe('The text content to write.'),
})

const searchFilesInputSchema = z.object({
  path: z.string().describe('The relative path of the directory to search in.'),
  regex: z.string().describe('The regular expression to search for.'),
  file_pattern: z.string().optional().describe("Optional glob to filter file names (e.g. '*.txt')."),
})

/**
 * Creates the file-system tool set: `list_directory`, `read_file`,
 * `create_file`, `write_file` and `search_files`.
 *
 * Every path is resolved inside `workingDirectory`; paths that escape it are
 * rejected. Without a working directory the tools report themselves
 * unavailable and are never offered to the model. The two writers set
 * `requiresApproval`.
 *
 * @example
 * ```typescript
 * const registry = new ToolRegistry(createFileSystemTools({ workingDirectory: '/srv/project' }))
 * ```
 */
export function createFileSystemTools(options: FileSystemToolsOptions = {}): Tool[] {
  const { workingDirectory, maxFileSize } = options
  const isAvailable = (): boolean => workingDirectory !== undefined && workingDirectory !== ''

  const workspace = (): Workspace => {
    if (workingDirectory === undefined || workingDirectory === '') {
      throw new FileSystemError('No working directory is configured')
    }
    return new Workspace(workingDirectory, maxFileSize)
  }

  const listDirectory = tool({
    name: 'list_directory',
    description: 'List files and directories in the specified directory within the working directory.',
    inputSchema: listDirectoryInputSchema,
    isAvailable,
    callback: async ({ path }) => {
      const entries = await workspace().listDirectory(path)
      if (entries.length === 0) {
        return `Directory ${path} is empty.`
      }
      const lines = entries.map((entry) =>
        entry.isDirectory ? `[dir] ${entry.name}` : `[file] ${entry.name} (${entry.size ?? 0} bytes)`
      )
      return `Files in ${path}:\n${lines.join('\n')}`
    },
  })

  const readFile = tool({
    name: 'read_file',
    description: 'Read the contents of a text file within the working directory.',
    inputSchema: readFileInputSchema,
    isAvailable,
    callback: ({ path }) => workspace().readTextFile(path),
  })

  const createFile = tool({
    name: 'create_file',
    description: 'Create a new file with the specified content. Fails if the file already exists.',
    inputSchema: writeInputSchema,
    requiresApproval: true,
    isAvailable,
    callback: async ({ path, content }) => {
      await workspace().createFile(path, content)
      logger.info({ path }, 'created file')
      return `File created successfully at ${path}.`
    },
  })

  const writeFile = tool({
    name: 'write_file',
    description: 'Write content to a file, overwriting existing content if the file exists.',
    inputSchema: writeInputSchema,
    requiresApproval: true,
    isAvailable,
    callback: async ({ path, content }) => {
      await workspace().writeFile(path, content)
      logger.info({ path }, 'wrote file')
      return `Content written to file at ${path}.`
    },
  })

  const searchFiles = tool({
    name: 'search_files',
    description: 'Search the files directly inside a directory for a regular expression.',
    inputSchema: searchFilesInputSchema,
    isAvailable,
    callback: async ({ path, regex, file_pattern: filePattern }, context) => {
      let pattern: RegExp
      try {
        pattern = new RegExp(regex)
      } catch (error) {
        throw new InvalidArgumentsError(
          'search_files',
          `regex: not a valid regular expression (${normalizeError(error).message})`
        )
      }
      const nameFilter = filePattern !== undefined ? globToRegExp(filePattern) : undefined

      const ws = workspace()
      const matches: string[] = []
      for (const entry of await ws.listDirectory(path)) {
        context?.signal.throwIfAborted()
        if (entry.isDirectory) continue
        if (nameFilter !== undefined && !nameFilter.test(entry.name)) continue

        const content = await ws.tryReadTextFile(`${path}/${entry.name}`)
        if (content !== undefined && pattern.test(content)) {
          matches.push(entry.name)
        }
      }

      if (matches.length === 0) {
        return `No files matching '${regex}' in ${path}.`
      }
      return `Files matching '${regex}' in ${path}:\n${matches.join('\n')}`
    },
  })

  return [listDirectory, readFile, createFile, writeFile, searchFiles]
}
