import { Agent, type AgentOptions } from './agent.js'
import type { ModelSettings, Settings } from '../config/schema.js'
import type { ModelGateway } from '../models/model.js'
import { OpenRouterModel } from '../models/openrouter.js'
import { BedrockModel } from '../models/bedrock.js'
import { createDefaultToolRegistry } from '../registry/default-tools.js'
import { buildSystemPrompt } from '../prompts/system-prompt.js'
import { ConfigurationError } from '../errors.js'
import { createLogger, setLogLevel } from '../logging/logger.js'

/**
 * Creates the model gateway selected by `settings.provider`.
 *
 * @throws ConfigurationError when OpenRouter is selected without an API key
 */
export function createModelGateway(settings: ModelSettings): ModelGateway {
  switch (settings.provider) {
    case 'openrouter':
      if (settings.apiKey === undefined || settings.apiKey === '') {
        throw new ConfigurationError('OpenRouter needs an API key: set model.apiKey or OPENROUTER_API_KEY')
      }
      return new OpenRouterModel({
        apiKey: settings.apiKey,
        temperature: settings.temperature,
        ...(settings.modelId !== undefined ? { modelId: settings.modelId } : {}),
      })
    case 'bedrock':
      return new BedrockModel({
        temperature: settings.temperature,
        ...(settings.region !== undefined ? { region: settings.region } : {}),
        ...(settings.modelId !== undefined ? { modelId: settings.modelId } : {}),
      })
  }
}

/**
 * Builds an agent from validated settings: the configured model gateway, the
 * default tool registry, the system prompt with any custom instructions, and
 * the approval mode and run limits. `overrides` replace any of the pieces.
 *
 * @example
 * ```typescript
 * const agent = createAgentFromSettings(loadSettings({ file: 'agent.yaml' }))
 * const result = await agent.start('Summarize README.md')
 * ```
 */
export function createAgentFromSettings(settings: Settings, overrides: Partial<AgentOptions> = {}): Agent {
  setLogLevel(settings.logLevel)

  return new Agent({
    config: settings.agent,
    systemPrompt: buildSystemPrompt(settings.customPrompt),
    logger: createLogger('agent'),
    ...overrides,
    model: overrides.model ?? createModelGateway(settings.model),
    toolRegistry: overrides.toolRegistry ?? createDefaultToolRegistry(settings.tools),
  })
}
