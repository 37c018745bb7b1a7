import type { ToolSettings } from '../config/schema.js'
import { createFileSystemTools } from '../vended-tools/file_system/index.js'
import { createWebSearchTool } from '../vended-tools/web_search/index.js'
import { ToolRegistry } from './tool-registry.js'

/**
 * Builds a registry holding the vended tools, configured from settings.
 *
 * File-system tools are available only with a working directory and
 * `google_search` only with both search credentials. Tools named in
 * `disabled` are registered but switched off.
 */
export function createDefaultToolRegistry(settings: ToolSettings): ToolRegistry {
  const registry = new ToolRegistry([
    ...createFileSystemTools({ workingDirectory: settings.workingDirectory }),
    createWebSearchTool({ apiKey: settings.search.apiKey, engineId: settings.search.engineId }),
  ])

  for (const name of settings.disabled) {
    registry.setEnabled(name, false)
  }
  return registry
}
