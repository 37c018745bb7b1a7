import type { ModelGateway, StreamOptions } from '../models/model.js'
import type { ModelStreamEvent } from '../models/streaming.js'
import { ToolRegistry } from '../registry/tool-registry.js'
import type { Tool } from '../tools/tool.js'
import { RegistryToolExecutor, type ToolExecutor } from '../tools/executor.js'
import { PolicyApprovalGate, type ApprovalGate } from '../approval/approval-gate.js'
import { InMemoryConversationStore, type ConversationStore } from '../conversation/conversation-store.js'
import { AgentConfigSchema, type AgentConfig, type AgentConfigInput } from '../config/schema.js'
import { Message, type MessageData, type StopReason, type ToolCallReference } from '../types/messages.js'
import type { AgentListener, AgentNotification, AgentResult, MessageDelta } from '../types/agent.js'
import { ensureDefined } from '../types/validation.js'
import { createLogger, type Logger } from '../logging/logger.js'
import { ToolCallAssembler } from './tool-call-assembler.js'
import { createToolCallProposal, toToolCallReference, type ToolCallProposal } from './proposal.js'
import { assertNever, canTransition, isTerminal, type AgentState, type TerminalState } from './state.js'
import {
  AlreadyRunningError,
  CancelledError,
  ConfigurationError,
  ExecutionFailedError,
  MaxToolCallsExceededError,
  StaleProposalError,
  ToolError,
  ToolFailureLimitError,
  TransportError,
  normalizeError,
} from '../errors.js'

/**
 * Options for creating a new Agent.
 */
export interface AgentOptions {
  /**
   * The model gateway the agent will use to make decisions.
   */
  model: ModelGateway

  /**
   * Registry shared with the executor. A new empty registry is created when
   * omitted.
   */
  toolRegistry?: ToolRegistry

  /**
   * Tools to register on top of whatever the registry already holds.
   */
  tools?: Tool[]

  /**
   * Runs approved tool calls. Defaults to an executor backed by the registry.
   */
  executor?: ToolExecutor

  /**
   * Approval policy. Defaults to {@link PolicyApprovalGate}.
   */
  approvalGate?: ApprovalGate

  /**
   * Message history. Defaults to an in-memory store seeded with `messages`.
   */
  conversationStore?: ConversationStore

  /**
   * An initial set of messages for the default in-memory store.
   */
  messages?: Message[] | MessageData[]

  /**
   * Approval mode and run limits; omitted fields take their defaults.
   */
  config?: AgentConfigInput

  /**
   * A system prompt which guides model behavior.
   */
  systemPrompt?: string

  /**
   * Logger for run lifecycle events.
   */
  logger?: Logger
}

type ApprovalResponse = 'approved' | 'rejected'

interface PendingApproval {
  proposal: ToolCallProposal
  resolve: (response: ApprovalResponse) => void
}

/**
 * Mutable bookkeeping of one run. Discarded when the run ends.
 */
class AgentRun {
  readonly controller = new AbortController()
  readonly approvedTools = new Set<string>()
  readonly consumedProposals = new Set<string>()
  readonly queue: ToolCallProposal[] = []
  toolCallCount = 0
  consecutiveToolFailures = 0
  streamingMessage: Message | undefined
  pendingApproval: PendingApproval | undefined
  approvalResponse: Promise<ApprovalResponse> | undefined
  /**
   * Terminal state and last message, captured at the terminal transition. A
   * listener may start the next run before this one resolves.
   */
  outcome: TerminalState | undefined
  lastMessage: Readonly<MessageData> | undefined

  get signal(): AbortSignal {
    return this.controller.signal
  }
}

/**
 * Drives a conversation between a user, a model and a set of tools.
 *
 * A run starts with {@link Agent.start} and moves through the states in
 * {@link AgentState}: the model is streamed, tool calls it proposes are gated
 * by the approval policy, approved calls are executed and their results are
 * fed back, until the model answers without calling a tool. At most one run is
 * active at a time. Subscribers observe every transition and history change.
 *
 * @example
 * ```typescript
 * const agent = new Agent({ model, tools: [listDirectory], config: { approvalMode: 'alwaysAsk' } })
 *
 * agent.subscribe(({ state }) => {
 *   if (state.type === 'awaitingApproval') agent.approve(state.proposal.id)
 * })
 *
 * const result = await agent.start('List the files in my project')
 * console.log(result.state.type) // 'completed'
 * ```
 */
export class Agent {
  /**
   * Effective approval mode and run limits.
   */
  readonly config: AgentConfig

  private readonly _model: ModelGateway
  private readonly _toolRegistry: ToolRegistry
  private readonly _executor: ToolExecutor
  private readonly _approvalGate: ApprovalGate
  private readonly _store: ConversationStore
  private readonly _systemPrompt?: string
  private readonly _logger: Logger
  private readonly _listeners = new Set<AgentListener>()

  private _state: AgentState = { type: 'idle' }
  private _run: AgentRun | undefined

  /**
   * Creates an instance of the Agent.
   * @param options - The configuration for the agent.
   * @throws ConfigurationError when `config` is invalid
   */
  constructor(options: AgentOptions) {
    const parsed = AgentConfigSchema.safeParse(options.config ?? {})
    if (!parsed.success) {
      throw new ConfigurationError(`Invalid agent configuration: ${parsed.error.message}`, { cause: parsed.error })
    }
    this.config = parsed.data

    this._model = options.model
    this._logger = options.logger ?? createLogger('agent')
    this._toolRegistry = options.toolRegistry ?? new ToolRegistry()
    for (const tool of options.tools ?? []) {
      this._toolRegistry.register(tool)
    }
    this._executor = options.executor ?? new RegistryToolExecutor(this._toolRegistry, this._logger)
    this._approvalGate = options.approvalGate ?? new PolicyApprovalGate()
    this._store = options.conversationStore ?? new InMemoryConversationStore(options.messages ?? [])

    if (options.systemPrompt !== undefined) {
      this._systemPrompt = options.systemPrompt
    }
  }

  /**
   * The current state. A terminal state stays visible until the next run.
   */
  get state(): AgentState {
    return this._state
  }

  /**
   * Snapshot of the conversation history.
   */
  get messages(): Readonly<MessageData>[] {
    return this._store.history().map((message) => message.toMessageData())
  }

  /**
   * The tool registry for managing the agent's tools.
   */
  get toolRegistry(): ToolRegistry {
    return this._toolRegistry
  }

  /**
   * Whether a run is in progress.
   */
  get isRunning(): boolean {
    return this._run !== undefined
  }

  /**
   * Registers a listener for state transitions and history changes.
   *
   * @returns Function that removes the listener
   */
  subscribe(listener: AgentListener): () => void {
    this._listeners.add(listener)
    return (): void => {
      this._listeners.delete(listener)
    }
  }

  /**
   * Starts a run with a user instruction.
   *
   * The returned promise resolves once the run reaches `completed` or
   * `failed`; it does not reject for run failures.
   *
   * @param userText - The user's instruction
   * @returns Promise of the run's outcome
   * @throws AlreadyRunningError when a run is already in progress
   */
  start(userText: string): Promise<AgentResult> {
    if (this._run !== undefined) {
      throw new AlreadyRunningError()
    }

    const run = new AgentRun()
    this._run = run
    this._state = { type: 'idle' }
    this._logger.info(
      { approvalMode: this.config.approvalMode, maxToolCallsPerRun: this.config.maxToolCallsPerRun },
      'run started'
    )
    return this._drive(run, userText)
  }

  /**
   * Approves the proposal awaiting approval and lets the run execute it.
   *
   * @throws StaleProposalError when `proposalId` is not the proposal awaiting approval
   */
  approve(proposalId: string): void {
    const pending = this._takePendingApproval(proposalId)
    this._logger.info({ tool: pending.proposal.toolName, proposalId }, 'proposal approved')
    pending.resolve('approved')
  }

  /**
   * Rejects the proposal awaiting approval. The model is told the call was
   * rejected and the run continues.
   *
   * @throws StaleProposalError when `proposalId` is not the proposal awaiting approval
   */
  reject(proposalId: string): void {
    const pending = this._takePendingApproval(proposalId)
    this._logger.info({ tool: pending.proposal.toolName, proposalId }, 'proposal rejected')
    pending.resolve('rejected')
  }

  /**
   * Cancels the active run. Text streamed so far is kept and the run ends in
   * `failed` with reason `cancelled`. Does nothing when no run is active.
   */
  cancel(): void {
    const run = this._run
    if (run === undefined || run.signal.aborted) {
      return
    }
    this._logger.info({ state: this._state.type }, 'cancelling run')
    run.controller.abort()
  }

  private async _drive(run: AgentRun, userText: string): Promise<AgentResult> {
    try {
      await this._appendMessage(Message.user(userText))
      await this._openAssistantMessage(run)
      this._transition({ type: 'awaitingModel' })

      while (run.outcome === undefined) {
        if (run.signal.aborted) {
          throw new CancelledError()
        }
        await this._step(run, this._state)
      }
    } catch (error) {
      await this._fail(run, error)
    } finally {
      if (this._run === run) {
        this._run = undefined
      }
    }

    return this._result(run)
  }

  private async _step(run: AgentRun, state: AgentState): Promise<void> {
    switch (state.type) {
      case 'awaitingModel':
        return this._continueTurn(run)
      case 'toolProposed':
        return this._gate(run, state.proposal)
      case 'awaitingApproval':
        return this._awaitApproval(run, state.proposal)
      case 'executingTool':
        return this._executeTool(run, state.proposal)
      case 'idle':
      case 'completed':
      case 'failed':
        throw new Error(`Run loop reached '${state.type}' unexpectedly`)
      default:
        return assertNever(state)
    }
  }

  /**
   * Takes the next proposal queued from the last turn, or asks the model for
   * a new turn once the queue is empty.
   */
  private async _continueTurn(run: AgentRun): Promise<void> {
    const next = run.queue.shift()
    if (next !== undefined) {
      this._transition({ type: 'toolProposed', proposal: next })
      return
    }
    await this._streamTurn(run)
  }

  private async _streamTurn(run: AgentRun): Promise<void> {
    const message = ensureDefined(run.streamingMessage, 'streaming assistant message')
    const history = this._store.history().filter((entry) => entry !== message)
    const options: StreamOptions = {
      toolSpecs: this._toolRegistry.listAvailable().map((tool) => tool.toolSpec),
      signal: run.signal,
    }
    if (this._systemPrompt !== undefined) {
      options.systemPrompt = this._systemPrompt
    }

    const assembler = new ToolCallAssembler()
    const iterator = this._model.stream(history, options)[Symbol.asyncIterator]()
    let stopReason: StopReason | undefined

    try {
      while (stopReason === undefined) {
        const next = await raceAbort(iterator.next(), run.signal)
        if (next.done) break
        stopReason = this._handleStreamEvent(message, assembler, next.value)
      }
      const closing = stopReason !== undefined ? iterator.return?.() : undefined
      if (closing !== undefined) {
        await raceAbort(closing, run.signal)
      }
    } catch (error) {
      if (run.signal.aborted) {
        this._closeIterator(iterator)
        throw new CancelledError()
      }
      throw error instanceof TransportError ? error : new TransportError(normalizeError(error).message, { cause: error })
    }

    if (stopReason === undefined) {
      throw new TransportError('Model stream ended without an end-of-turn signal')
    }

    const proposals = this._collectProposals(assembler, stopReason)
    await this._finalizeStreamingMessage(run, proposals.map(toToolCallReference))
    this._logger.debug({ stopReason, toolCalls: proposals.length }, 'model turn finished')

    const [first, ...rest] = proposals
    if (first === undefined) {
      this._transition({ type: 'completed' })
      return
    }
    run.queue.push(...rest)
    this._transition({ type: 'toolProposed', proposal: first })
  }

  /**
   * Applies one stream event to the streaming message or the assembler.
   *
   * @returns The stop reason once the end-of-turn event arrives
   */
  private _handleStreamEvent(
    message: Message,
    assembler: ToolCallAssembler,
    event: ModelStreamEvent
  ): StopReason | undefined {
    switch (event.type) {
      case 'modelContentBlockStartEvent':
        if (event.start !== undefined) {
          assembler.start(event.start, event.contentBlockIndex)
        }
        return undefined
      case 'modelContentBlockDeltaEvent':
        if (event.delta.type === 'textDelta') {
          if (event.delta.text !== '') {
            message.appendText(event.delta.text)
            this._emit({ type: 'textAppended', messageId: message.id, text: event.delta.text })
          }
        } else {
          assembler.appendArguments(event.delta.input, event.contentBlockIndex)
        }
        return undefined
      case 'modelMessageStopEvent':
        return event.stopReason
      case 'modelMetadataEvent':
        if (event.usage !== undefined) {
          this._logger.debug({ usage: event.usage }, 'model usage')
        }
        return undefined
      case 'modelMessageStartEvent':
      case 'modelContentBlockStopEvent':
        return undefined
    }
  }

  private _collectProposals(assembler: ToolCallAssembler, stopReason: StopReason): ToolCallProposal[] {
    if (stopReason !== 'toolUse' && stopReason !== 'endTurn') {
      if (assembler.size > 0) {
        this._logger.warn({ stopReason, fragments: assembler.size }, 'discarding tool call fragments')
        assembler.clear()
      }
      return []
    }

    const { toolCalls, incomplete } = assembler.assemble()
    if (incomplete.length > 0) {
      this._logger.warn({ indices: incomplete }, 'dropping tool calls without a name')
    }
    return toolCalls.map((call) =>
      createToolCallProposal({
        id: call.id,
        toolName: call.name,
        type: call.type,
        arguments: call.arguments,
        requiresApproval: this._toolRegistry.lookup(call.name)?.requiresApproval ?? true,
      })
    )
  }

  private _gate(run: AgentRun, proposal: ToolCallProposal): void {
    const decision = this._approvalGate.decide(proposal, this.config, run.approvedTools)
    if (decision === 'approved') {
      this._transition({ type: 'executingTool', proposal })
      return
    }

    // Registered before the transition so listeners may answer synchronously
    run.approvalResponse = new Promise<ApprovalResponse>((resolve) => {
      run.pendingApproval = { proposal, resolve }
    })
    this._transition({ type: 'awaitingApproval', proposal })
  }

  private async _awaitApproval(run: AgentRun, proposal: ToolCallProposal): Promise<void> {
    const response = await raceAbort(ensureDefined(run.approvalResponse, 'approval response'), run.signal)
    run.approvalResponse = undefined

    if (response === 'approved') {
      if (this.config.approvalMode === 'perThread') {
        run.approvedTools.add(proposal.toolName)
      }
      this._transition({ type: 'executingTool', proposal })
      return
    }

    this._consume(run, proposal)
    await this._appendMessage(
      Message.toolResult(proposal.id, `Tool call '${proposal.toolName}' was rejected by the user.`, true)
    )
    await this._enterAwaitingModel(run)
  }

  private async _executeTool(run: AgentRun, proposal: ToolCallProposal): Promise<void> {
    this._consume(run, proposal)
    run.toolCallCount += 1
    if (run.toolCallCount > this.config.maxToolCallsPerRun) {
      throw new MaxToolCallsExceededError(this.config.maxToolCallsPerRun)
    }

    let result: Message
    try {
      const output = await raceAbort(this._executor.executeToolCall(proposal, { signal: run.signal }), run.signal)
      run.consecutiveToolFailures = 0
      result = Message.toolResult(proposal.id, output)
    } catch (error) {
      if (run.signal.aborted) {
        throw new CancelledError()
      }
      const toolError =
        error instanceof ToolError ? error : new ExecutionFailedError(normalizeError(error).message, { cause: error })
      run.consecutiveToolFailures += 1
      this._logger.warn({ tool: proposal.toolName, code: toolError.code, err: toolError }, 'tool call failed')
      result = Message.toolResult(proposal.id, toolError.message, true)
    }

    await this._appendMessage(result)
    if (run.consecutiveToolFailures > this.config.maxConsecutiveToolFailures) {
      throw new ToolFailureLimitError(this.config.maxConsecutiveToolFailures)
    }
    await this._enterAwaitingModel(run)
  }

  /**
   * Returns to `awaitingModel`, opening a new streaming message first unless
   * queued proposals still have to be handled.
   */
  private async _enterAwaitingModel(run: AgentRun): Promise<void> {
    if (run.queue.length === 0) {
      await this._openAssistantMessage(run)
    }
    this._transition({ type: 'awaitingModel' })
  }

  private _consume(run: AgentRun, proposal: ToolCallProposal): void {
    if (run.consumedProposals.has(proposal.id)) {
      throw new Error(`Proposal '${proposal.id}' was already consumed`)
    }
    run.consumedProposals.add(proposal.id)
  }

  private _takePendingApproval(proposalId: string): PendingApproval {
    const run = this._run
    const pending = run?.pendingApproval
    if (
      run === undefined ||
      pending === undefined ||
      this._state.type !== 'awaitingApproval' ||
      pending.proposal.id !== proposalId
    ) {
      throw new StaleProposalError(proposalId)
    }
    run.pendingApproval = undefined
    return pending
  }

  private async _fail(run: AgentRun, error: unknown): Promise<void> {
    if (run.outcome !== undefined || this._run !== run) {
      this._logger.error({ err: error }, 'error after run ended')
      return
    }

    const reason = run.signal.aborted ? new CancelledError().message : normalizeError(error).message
    run.pendingApproval = undefined
    run.queue.length = 0

    try {
      await this._finalizeStreamingMessage(run)
    } catch (finalizeError) {
      this._logger.error({ err: finalizeError }, 'could not store partial assistant message')
    }

    if (run.signal.aborted) {
      this._logger.info({ state: this._state.type }, 'run cancelled')
    } else {
      this._logger.error({ err: error, state: this._state.type }, 'run failed')
    }
    this._transition({ type: 'failed', reason })
  }

  private async _openAssistantMessage(run: AgentRun): Promise<void> {
    const message = Message.streamingAssistant()
    run.streamingMessage = message
    await this._appendMessage(message)
  }

  private async _finalizeStreamingMessage(run: AgentRun, toolCalls?: ToolCallReference[]): Promise<void> {
    const message = run.streamingMessage
    if (message === undefined) {
      return
    }
    run.streamingMessage = undefined
    message.finalize(toolCalls)
    await this._store.update(message)
    this._emit({ type: 'messageFinalized', message: message.toMessageData() })
  }

  private async _appendMessage(message: Message): Promise<void> {
    await this._store.append(message)
    this._emit({ type: 'messageAdded', message: message.toMessageData() })
  }

  private _transition(next: AgentState): void {
    const current = this._state
    if (!canTransition(current.type, next.type)) {
      throw new Error(`Invalid agent state transition from '${current.type}' to '${next.type}'`)
    }
    this._state = next
    if (isTerminal(next)) {
      if (this._run !== undefined) {
        this._run.outcome = next
        this._run.lastMessage = this._store.history().at(-1)?.toMessageData()
      }
      this._run = undefined
      this._logger.info({ state: next }, 'run finished')
    } else {
      this._logger.debug({ from: current.type, to: next.type }, 'state transition')
    }
    this._emit()
  }

  private _emit(delta?: MessageDelta): void {
    const notification: AgentNotification = delta === undefined ? { state: this._state } : { state: this._state, delta }
    for (const listener of [...this._listeners]) {
      try {
        listener(notification)
      } catch (error) {
        this._logger.warn({ err: error }, 'agent listener threw')
      }
    }
  }

  private _closeIterator(iterator: AsyncIterator<ModelStreamEvent>): void {
    const closing = iterator.return?.()
    if (closing !== undefined) {
      void closing.then(undefined, (error: unknown) => {
        this._logger.debug({ err: error }, 'model stream closed with an error after cancellation')
      })
    }
  }

  private _result(run: AgentRun): AgentResult {
    const state = run.outcome
    if (state === undefined) {
      throw new Error(`Run ended in non-terminal state '${this._state.type}'`)
    }
    return {
      state,
      lastMessage: run.lastMessage,
      toolCallCount: run.toolCallCount,
    }
  }
}

/**
 * Settles with `promise`, or rejects with {@link CancelledError} as soon as
 * `signal` aborts. The losing promise keeps its handlers, so a late rejection
 * is never unhandled.
 */
function raceAbort<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(new CancelledError())
    if (signal.aborted) {
      onAbort()
    } else {
      signal.addEventListener('abort', onAbort, { once: true })
    }
    void promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort)
        resolve(value)
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort)
        reject(error)
      }
    )
  })
}
