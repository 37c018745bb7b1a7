import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import * as fs from 'node:fs'
import * as os from 'node:os'
import * as path from 'node:path'
import { loadSettings } from '../settings.js'
import { ConfigurationError } from '../../errors.js'

describe('loadSettings', () => {
  let dir: string

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'settings-'))
  })

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true })
  })

  function writeSettings(content: string): string {
    const file = path.join(dir, 'agent.yaml')
    fs.writeFileSync(file, content)
    return file
  }

  it('applies defaults when nothing is configured', () => {
    expect(loadSettings({ env: {} })).toEqual({
      agent: { approvalMode: 'alwaysAsk', maxToolCallsPerRun: 10, maxConsecutiveToolFailures: 3 },
      model: { provider: 'openrouter', temperature: 0.8 },
      tools: { search: {}, disabled: [] },
      customPrompt: '',
      logLevel: 'info',
    })
  })

  it('reads a YAML file', () => {
    const file = writeSettings(
      [
        'agent:',
        '  approvalMode: perThread',
        '  maxToolCallsPerRun: 4',
        'model:',
        '  provider: bedrock',
        '  region: eu-west-1',
        'tools:',
        '  workingDirectory: /srv/project',
        '  disabled: [write_file]',
        'customPrompt: Answer in French.',
      ].join('\n')
    )

    const settings = loadSettings({ file, env: {} })

    expect(settings.agent).toEqual({ approvalMode: 'perThread', maxToolCallsPerRun: 4, maxConsecutiveToolFailures: 3 })
    expect(settings.model).toEqual({ provider: 'bedrock', region: 'eu-west-1', temperature: 0.8 })
    expect(settings.tools).toEqual({ workingDirectory: '/srv/project', search: {}, disabled: ['write_file'] })
    expect(settings.customPrompt).toBe('Answer in French.')
  })

  it('treats an empty file as all defaults', () => {
    const file = writeSettings('')

    expect(loadSettings({ file, env: {} }).agent.approvalMode).toBe('alwaysAsk')
  })

  it('lets the environment override the file', () => {
    const file = writeSettings('agent:\n  approvalMode: perThread\n  maxToolCallsPerRun: 4\n')

    const settings = loadSettings({
      file,
      env: {
        AGENT_APPROVAL_MODE: 'autoApprove',
        AGENT_MAX_TOOL_CALLS: '7',
        OPENROUTER_API_KEY: 'test-key',
        GOOGLE_SEARCH_API_KEY: 'test-search-key',
        GOOGLE_SEARCH_ENGINE_ID: 'test-engine',
        LOG_LEVEL: 'silent',
        MODEL_ID: '',
      },
    })

    expect(settings.agent).toEqual({ approvalMode: 'autoApprove', maxToolCallsPerRun: 7, maxConsecutiveToolFailures: 3 })
    expect(settings.model.apiKey).toBe('test-key')
    expect(settings.model.modelId).toBeUndefined()
    expect(settings.tools.search).toEqual({ apiKey: 'test-search-key', engineId: 'test-engine' })
    expect(settings.logLevel).toBe('silent')
  })

  it('lists every invalid field', () => {
    const file = writeSettings('agent:\n  approvalMode: sometimes\n  maxToolCallsPerRun: 0\n')

    const error = (() => {
      try {
        return loadSettings({ file, env: {} })
      } catch (caught) {
        return caught
      }
    })()

    expect(error).toBeInstanceOf(ConfigurationError)
    const lines = String(error instanceof Error ? error.message : '').split('\n')
    expect(lines[0]).toBe(`Invalid configuration in ${file}:`)
    expect(lines.slice(1).map((line) => line.slice(0, line.indexOf(': ')))).toEqual([
      '  - agent.approvalMode',
      '  - agent.maxToolCallsPerRun',
    ])
  })

  it('names the environment when there is no file', () => {
    expect(() => loadSettings({ env: { AGENT_MAX_TOOL_CALLS: 'many' } })).toThrow(
      'Invalid configuration in environment:\n  - agent.maxToolCallsPerRun: '
    )
  })

  it('fails on a missing explicit file', () => {
    const file = path.join(dir, 'missing.yaml')

    expect(() => loadSettings({ file, env: {} })).toThrow(`Configuration file not found: ${file}`)
  })

  it('fails on malformed YAML', () => {
    const file = writeSettings('agent: [unclosed\n')

    expect(() => loadSettings({ file, env: {} })).toThrow(`Could not parse ${file}`)
  })

  it('requires a mapping at the top level', () => {
    const file = writeSettings('- one\n- two\n')

    expect(() => loadSettings({ file, env: {} })).toThrow(
      `Invalid configuration in ${file}: expected a mapping at the top level`
    )
  })
})
