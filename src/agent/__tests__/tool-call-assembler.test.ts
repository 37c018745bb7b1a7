import { describe, it, expect } from 'vitest'
import { ToolCallAssembler } from '../tool-call-assembler.js'

describe('ToolCallAssembler', () => {
  it('concatenates argument fragments per index', () => {
    const assembler = new ToolCallAssembler()
    assembler.start({ type: 'toolUseStart', toolUseId: 'call_1', toolType: 'function', name: 'read_file' }, 0)
    assembler.appendArguments('{"pa', 0)
    assembler.appendArguments('th":"a.txt"}', 0)

    expect(assembler.assemble()).toEqual({
      toolCalls: [{ index: 0, id: 'call_1', type: 'function', name: 'read_file', arguments: '{"path":"a.txt"}' }],
      incomplete: [],
    })
  })

  it('orders calls by index, not by arrival', () => {
    const assembler = new ToolCallAssembler()
    assembler.start({ type: 'toolUseStart', toolUseId: 'call_b', name: 'beta' }, 1)
    assembler.start({ type: 'toolUseStart', toolUseId: 'call_a', name: 'alpha' }, 0)
    assembler.appendArguments('{}', 1)
    assembler.appendArguments('{"x":1}', 0)

    const { toolCalls } = assembler.assemble()

    expect(toolCalls.map((call) => [call.index, call.name, call.arguments])).toEqual([
      [0, 'alpha', '{"x":1}'],
      [1, 'beta', '{}'],
    ])
  })

  it('keeps the first non-empty id, type and name seen for an index', () => {
    const assembler = new ToolCallAssembler()
    assembler.start({ type: 'toolUseStart', toolUseId: 'call_1', name: '' }, 0)
    assembler.start({ type: 'toolUseStart', toolUseId: 'call_2', toolType: 'function', name: 'echo' }, 0)
    assembler.start({ type: 'toolUseStart', name: 'other' }, 0)

    expect(assembler.assemble().toolCalls).toEqual([
      { index: 0, id: 'call_1', type: 'function', name: 'echo', arguments: '' },
    ])
  })

  it('fills in a generated id and the function type', () => {
    const assembler = new ToolCallAssembler()
    assembler.start({ type: 'toolUseStart', name: 'echo' }, 0)

    const [call] = assembler.assemble().toolCalls

    expect(call?.type).toBe('function')
    expect(call?.id).toMatch(/^call_[0-9a-f-]{36}$/)
  })

  it('reports indices that never received a name', () => {
    const assembler = new ToolCallAssembler()
    assembler.start({ type: 'toolUseStart', name: 'echo' }, 0)
    assembler.appendArguments('{"orphan":true}', 3)

    const result = assembler.assemble()

    expect(result.toolCalls.map((call) => call.name)).toEqual(['echo'])
    expect(result.incomplete).toEqual([3])
  })

  it('assigns the next free index to starts without one and routes bare fragments to it', () => {
    const assembler = new ToolCallAssembler()
    assembler.start({ type: 'toolUseStart', name: 'first' })
    assembler.appendArguments('{"a":1}')
    assembler.start({ type: 'toolUseStart', name: 'second' })
    assembler.appendArguments('{"b":2}')

    expect(assembler.assemble().toolCalls.map((call) => [call.index, call.name, call.arguments])).toEqual([
      [0, 'first', '{"a":1}'],
      [1, 'second', '{"b":2}'],
    ])
  })

  it('clears the buffer after assembling', () => {
    const assembler = new ToolCallAssembler()
    assembler.start({ type: 'toolUseStart', name: 'echo' }, 0)

    assembler.assemble()

    expect(assembler.size).toBe(0)
    expect(assembler.assemble()).toEqual({ toolCalls: [], incomplete: [] })
  })
})
