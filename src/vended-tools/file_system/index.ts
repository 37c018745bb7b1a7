/**
 * File-system tools confined to a working directory.
 */

export { createFileSystemTools } from './file-system.js'
export { FileSystemError } from './workspace.js'
export type { FileSystemToolsOptions, DirectoryEntry } from './types.js'
