/**
 * Configuration options for the file-system tools.
 */
export interface FileSystemToolsOptions {
  /**
   * Directory every tool path is resolved against. The tools report
   * themselves unavailable while it is unset.
   */
  workingDirectory?: string

  /**
   * Maximum file size in bytes that can be read (default: 1048576 / 1MB).
   */
  maxFileSize?: number
}

/**
 * One entry of a directory listing.
 */
export interface DirectoryEntry {
  name: string
  isDirectory: boolean
  /**
   * Size in bytes. Only set for files.
   */
  size?: number
}
