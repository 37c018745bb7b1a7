import { describe, it, expect } from 'vitest'
import { createAgentFromSettings, createModelGateway } from '../factory.js'
import { SettingsSchema } from '../../config/schema.js'
import { OpenRouterModel } from '../../models/openrouter.js'
import { BedrockModel } from '../../models/bedrock.js'
import { ConfigurationError } from '../../errors.js'
import { ToolRegistry } from '../../registry/tool-registry.js'
import { MockMessageModel } from '../../__fixtures__/mock-message-model.js'

describe('createModelGateway', () => {
  it('creates an OpenRouter gateway with its default model', () => {
    const model = createModelGateway({ provider: 'openrouter', apiKey: 'test-key', temperature: 0.8 })

    expect(model).toBeInstanceOf(OpenRouterModel)
    expect(model instanceof OpenRouterModel ? model.modelId : undefined).toBe('openai/gpt-4o-mini')
  })

  it('requires an OpenRouter API key', () => {
    expect(() => createModelGateway({ provider: 'openrouter', apiKey: '', temperature: 0.8 })).toThrow(
      ConfigurationError
    )
  })

  it('creates a Bedrock gateway with the configured model', () => {
    const model = createModelGateway({
      provider: 'bedrock',
      modelId: 'amazon.nova-pro-v1:0',
      region: 'us-east-1',
      temperature: 0.2,
    })

    expect(model).toBeInstanceOf(BedrockModel)
    expect(model instanceof BedrockModel ? model.getConfig() : undefined).toEqual({
      modelId: 'amazon.nova-pro-v1:0',
      temperature: 0.2,
    })
  })
})

describe('createAgentFromSettings', () => {
  const settings = SettingsSchema.parse({
    agent: { approvalMode: 'autoApprove', maxToolCallsPerRun: 3 },
    model: { apiKey: 'test-key' },
    tools: { workingDirectory: '/srv/project', disabled: ['write_file'] },
    customPrompt: 'Answer in French.',
    logLevel: 'silent',
  })

  it('applies the agent config and the default tools', () => {
    const agent = createAgentFromSettings(settings, { model: new MockMessageModel() })

    expect(agent.config).toEqual({ approvalMode: 'autoApprove', maxToolCallsPerRun: 3, maxConsecutiveToolFailures: 3 })
    expect(agent.toolRegistry.listAvailable().map((tool) => tool.name)).toEqual([
      'list_directory',
      'read_file',
      'create_file',
      'search_files',
    ])
  })

  it('sends the system prompt with the custom instructions', async () => {
    const model = new MockMessageModel().addTextTurn('Bonjour')
    const agent = createAgentFromSettings(settings, { model })

    const result = await agent.start('Hi')

    expect(result.state).toEqual({ type: 'completed' })
    expect(model.calls[0]?.options.systemPrompt?.endsWith('## Custom Instructions:\nAnswer in French.')).toBe(true)
  })

  it('uses the overrides it is given', () => {
    const toolRegistry = new ToolRegistry()

    const agent = createAgentFromSettings(settings, { model: new MockMessageModel(), toolRegistry })

    expect(agent.toolRegistry).toBe(toolRegistry)
  })
})
