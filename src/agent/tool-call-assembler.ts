import { randomUUID } from 'node:crypto'
import type { ToolUseStart } from '../models/streaming.js'

/**
 * A tool call reassembled from streamed fragments.
 */
export interface AssembledToolCall {
  index: number
  id: string
  type: string
  name: string
  arguments: string
}

export interface AssemblyResult {
  /**
   * Complete calls in index order.
   */
  toolCalls: AssembledToolCall[]

  /**
   * Indices whose fragments never carried a tool name.
   */
  incomplete: number[]
}

interface PendingToolCall {
  id?: string
  type?: string
  name?: string
  arguments: string
}

/**
 * Accumulates tool-call fragments for one model turn, keyed by block index.
 *
 * Identifier, type and name are taken from whichever fragment first carries
 * them; argument text is concatenated in arrival order. Fragments without an
 * index belong to the most recently started block.
 */
export class ToolCallAssembler {
  private readonly _pending = new Map<number, PendingToolCall>()
  private _currentIndex = 0

  /**
   * Number of block indices with buffered fragments.
   */
  get size(): number {
    return this._pending.size
  }

  /**
   * Records a tool-use start fragment.
   */
  start(start: ToolUseStart, index?: number): void {
    const key = index ?? this._nextIndex()
    this._currentIndex = key
    const entry = this._entry(key)
    entry.id ??= nonEmpty(start.toolUseId)
    entry.type ??= nonEmpty(start.toolType)
    entry.name ??= nonEmpty(start.name)
  }

  /**
   * Records a fragment of argument text.
   */
  appendArguments(fragment: string, index?: number): void {
    const key = index ?? this._currentIndex
    this._entry(key).arguments += fragment
  }

  /**
   * Builds the complete calls and clears the buffer. A missing identifier is
   * generated and a missing type defaults to `function`.
   */
  assemble(): AssemblyResult {
    const toolCalls: AssembledToolCall[] = []
    const incomplete: number[] = []

    for (const index of [...this._pending.keys()].sort((a, b) => a - b)) {
      const entry = this._pending.get(index)
      if (entry === undefined) continue
      if (entry.name === undefined) {
        incomplete.push(index)
        continue
      }
      toolCalls.push({
        index,
        id: entry.id ?? `call_${randomUUID()}`,
        type: entry.type ?? 'function',
        name: entry.name,
        arguments: entry.arguments,
      })
    }

    this.clear()
    return { toolCalls, incomplete }
  }

  /**
   * Drops every buffered fragment.
   */
  clear(): void {
    this._pending.clear()
    this._currentIndex = 0
  }

  private _entry(index: number): PendingToolCall {
    let entry = this._pending.get(index)
    if (entry === undefined) {
      entry = { arguments: '' }
      this._pending.set(index, entry)
    }
    return entry
  }

  private _nextIndex(): number {
    return this._pending.size === 0 ? 0 : Math.max(...this._pending.keys()) + 1
  }
}

function nonEmpty(value: string | undefined): string | undefined {
  return value === undefined || value === '' ? undefined : value
}
