/**
 * Configuration Schema
 *
 * Zod schemas for agent settings. Every field has a default so an empty
 * settings file (or none at all) yields a usable configuration.
 */
import { z } from 'zod'

/**
 * How tool-call proposals are confirmed.
 *
 * - `alwaysAsk` - every proposal waits for the user
 * - `perThread` - a tool waits for the user once per run, then runs freely
 * - `autoApprove` - nothing waits
 */
export const ApprovalModeSchema = z.enum(['alwaysAsk', 'perThread', 'autoApprove'])

export const AgentConfigSchema = z.object({
  approvalMode: ApprovalModeSchema.default('alwaysAsk'),
  maxToolCallsPerRun: z.number().int().positive().default(10),
  maxConsecutiveToolFailures: z.number().int().positive().default(3),
})

export const ModelSettingsSchema = z.object({
  provider: z.enum(['openrouter', 'bedrock']).default('openrouter'),
  /**
   * Falls back to the provider's default model when unset.
   */
  modelId: z.string().min(1).optional(),
  apiKey: z.string().optional(),
  region: z.string().optional(),
  temperature: z.number().min(0).max(2).default(0.8),
})

export const SearchSettingsSchema = z.object({
  apiKey: z.string().optional(),
  engineId: z.string().optional(),
})

export const ToolSettingsSchema = z.object({
  workingDirectory: z.string().optional(),
  search: SearchSettingsSchema.prefault({}),
  disabled: z.array(z.string()).default([]),
})

export const LogLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])

export const SettingsSchema = z.object({
  agent: AgentConfigSchema.prefault({}),
  model: ModelSettingsSchema.prefault({}),
  tools: ToolSettingsSchema.prefault({}),
  customPrompt: z.string().default(''),
  logLevel: LogLevelSchema.default('info'),
})

export type ApprovalMode = z.infer<typeof ApprovalModeSchema>
export type AgentConfig = z.infer<typeof AgentConfigSchema>
export type ModelSettings = z.infer<typeof ModelSettingsSchema>
export type ToolSettings = z.infer<typeof ToolSettingsSchema>
export type Settings = z.infer<typeof SettingsSchema>

/**
 * Input accepted wherever an {@link AgentConfig} is expected; omitted fields
 * take their defaults.
 */
export type AgentConfigInput = z.input<typeof AgentConfigSchema>
