import { describe, it, expect, vi, type Mock } from 'vitest'
import type { ConverseStreamOutput } from '@aws-sdk/client-bedrock-runtime'
import { BedrockModel, type BedrockTransport } from '../bedrock.js'
import { Message } from '../../types/messages.js'
import { collectEvents } from '../../__fixtures__/model-test-helpers.js'

async function* playback(events: ConverseStreamOutput[]): AsyncGenerator<ConverseStreamOutput> {
  for (const event of events) {
    yield event
  }
}

function scriptedTransport(events: ConverseStreamOutput[] = []): Mock<BedrockTransport> {
  return vi.fn<BedrockTransport>(async () => playback(events))
}

const readFileSpec = {
  name: 'read_file',
  description: 'Read a file',
  inputSchema: { type: 'object', properties: { path: { type: 'string' } } },
}

describe('BedrockModel', () => {
  describe('stream', () => {
    it('maps a text turn', async () => {
      const transport = scriptedTransport([
        { messageStart: { role: 'assistant' } },
        { contentBlockDelta: { contentBlockIndex: 0, delta: { text: 'Hello' } } },
        { contentBlockStop: { contentBlockIndex: 0 } },
        { messageStop: { stopReason: 'end_turn' } },
        {
          metadata: {
            usage: { inputTokens: 3, outputTokens: 2, totalTokens: 5 },
            metrics: { latencyMs: 12 },
          },
        },
      ])
      const model = new BedrockModel({ transport })

      const events = await collectEvents(model.stream([Message.user('Hi')], { toolSpecs: [] }))

      expect(events).toEqual([
        { type: 'modelMessageStartEvent', role: 'assistant' },
        { type: 'modelContentBlockDeltaEvent', contentBlockIndex: 0, delta: { type: 'textDelta', text: 'Hello' } },
        { type: 'modelContentBlockStopEvent', contentBlockIndex: 0 },
        { type: 'modelMessageStopEvent', stopReason: 'endTurn' },
        {
          type: 'modelMetadataEvent',
          usage: { inputTokens: 3, outputTokens: 2, totalTokens: 5 },
          metrics: { latencyMs: 12 },
        },
      ])
    })

    it('maps tool use blocks keeping their index', async () => {
      const transport = scriptedTransport([
        { messageStart: { role: 'assistant' } },
        {
          contentBlockStart: {
            contentBlockIndex: 1,
            start: { toolUse: { toolUseId: 'tooluse_1', name: 'read_file' } },
          },
        },
        { contentBlockDelta: { contentBlockIndex: 1, delta: { toolUse: { input: '{"path":' } } } },
        { contentBlockDelta: { contentBlockIndex: 1, delta: { toolUse: { input: '"a.txt"}' } } } },
        { contentBlockStop: { contentBlockIndex: 1 } },
        { messageStop: { stopReason: 'tool_use' } },
      ])
      const model = new BedrockModel({ transport })

      const events = await collectEvents(model.stream([Message.user('Read a.txt')], { toolSpecs: [readFileSpec] }))

      expect(events.slice(1, 4)).toEqual([
        {
          type: 'modelContentBlockStartEvent',
          contentBlockIndex: 1,
          start: { type: 'toolUseStart', name: 'read_file', toolUseId: 'tooluse_1', toolType: 'function' },
        },
        {
          type: 'modelContentBlockDeltaEvent',
          contentBlockIndex: 1,
          delta: { type: 'toolUseInputDelta', input: '{"path":' },
        },
        {
          type: 'modelContentBlockDeltaEvent',
          contentBlockIndex: 1,
          delta: { type: 'toolUseInputDelta', input: '"a.txt"}' },
        },
      ])
      expect(events.at(-1)).toEqual({ type: 'modelMessageStopEvent', stopReason: 'toolUse' })
    })

    it.each([
      ['max_tokens', 'maxTokens'],
      ['stop_sequence', 'stopSequence'],
      ['content_filtered', 'contentFiltered'],
      ['guardrail_intervened', 'guardrailIntervened'],
    ] as const)('maps stop reason %s to %s', async (raw, expected) => {
      const model = new BedrockModel({ transport: scriptedTransport([{ messageStop: { stopReason: raw } }]) })

      const events = await collectEvents(model.stream([Message.user('Hi')], { toolSpecs: [] }))

      expect(events).toEqual([{ type: 'modelMessageStopEvent', stopReason: expected }])
    })

    it('forwards the abort signal to the transport', async () => {
      const transport = scriptedTransport()
      const controller = new AbortController()
      const model = new BedrockModel({ transport })

      await collectEvents(model.stream([Message.user('Hi')], { toolSpecs: [], signal: controller.signal }))

      expect(transport.mock.calls[0]?.[1]).toBe(controller.signal)
    })

    it('fails when the response has no event stream', async () => {
      const model = new BedrockModel({ transport: vi.fn<BedrockTransport>(async () => undefined) })

      await expect(collectEvents(model.stream([Message.user('Hi')], { toolSpecs: [] }))).rejects.toThrow(
        'Bedrock returned a response without an event stream'
      )
    })
  })

  describe('request formatting', () => {
    const history = (): Message[] => [
      Message.user('Hi'),
      new Message({
        role: 'assistant',
        text: 'Let me look',
        toolCalls: [
          { id: 'tooluse_1', type: 'function', name: 'read_file', arguments: '{"path":"a.txt"}' },
          { id: 'tooluse_2', type: 'function', name: 'read_file', arguments: 'not json' },
        ],
      }),
      Message.toolResult('tooluse_1', 'contents'),
      Message.toolResult('tooluse_2', 'boom', true),
    ]

    it('builds a ConverseStream request', async () => {
      const transport = scriptedTransport()
      const model = new BedrockModel({ transport, maxTokens: 512 })

      await collectEvents(model.stream(history(), { toolSpecs: [readFileSpec], systemPrompt: 'Be brief.' }))

      expect(transport.mock.calls[0]?.[0]).toEqual({
        modelId: 'anthropic.claude-3-5-haiku-20241022-v1:0',
        system: [{ text: 'Be brief.' }],
        toolConfig: {
          tools: [
            {
              toolSpec: {
                name: 'read_file',
                description: 'Read a file',
                inputSchema: { json: { type: 'object', properties: { path: { type: 'string' } } } },
              },
            },
          ],
        },
        inferenceConfig: { maxTokens: 512 },
        messages: [
          { role: 'user', content: [{ text: 'Hi' }] },
          {
            role: 'assistant',
            content: [
              { text: 'Let me look' },
              { toolUse: { toolUseId: 'tooluse_1', name: 'read_file', input: { path: 'a.txt' } } },
              { toolUse: { toolUseId: 'tooluse_2', name: 'read_file', input: {} } },
            ],
          },
          {
            role: 'user',
            content: [
              { toolResult: { toolUseId: 'tooluse_1', content: [{ text: 'contents' }], status: 'success' } },
              { toolResult: { toolUseId: 'tooluse_2', content: [{ text: 'boom' }], status: 'error' } },
            ],
          },
        ],
      })
    })

    it('omits tool result status for models that do not accept it', async () => {
      const transport = scriptedTransport()
      const model = new BedrockModel({ transport, modelId: 'amazon.nova-pro-v1:0' })

      await collectEvents(model.stream(history(), { toolSpecs: [] }))

      const request = transport.mock.calls[0]?.[0]
      expect(request?.messages?.[2]?.content).toEqual([
        { toolResult: { toolUseId: 'tooluse_1', content: [{ text: 'contents' }] } },
        { toolResult: { toolUseId: 'tooluse_2', content: [{ text: 'boom' }] } },
      ])
      expect(request?.toolConfig).toBeUndefined()
      expect(request?.inferenceConfig).toBeUndefined()
    })

    it('skips empty user text and merges consecutive user turns', async () => {
      const transport = scriptedTransport()
      const model = new BedrockModel({ transport })

      await collectEvents(model.stream([Message.user('  '), Message.user('one'), Message.user('two')], { toolSpecs: [] }))

      expect(transport.mock.calls[0]?.[0].messages).toEqual([{ role: 'user', content: [{ text: 'one' }, { text: 'two' }] }])
    })
  })

  describe('config', () => {
    it('merges updates into the current config', () => {
      const model = new BedrockModel({ transport: scriptedTransport(), temperature: 0.5 })

      model.updateConfig({ maxTokens: 100 })

      expect(model.getConfig()).toEqual({
        modelId: 'anthropic.claude-3-5-haiku-20241022-v1:0',
        temperature: 0.5,
        maxTokens: 100,
      })
    })
  })
})
