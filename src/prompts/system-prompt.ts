/**
 * Fixed instructions sent with every model call. `{{timestamp}}` is replaced
 * with the current time when the prompt is built.
 */
export const BASE_SYSTEM_PROMPT = `# Assistant with Tool Access

You are a helpful assistant that can call tools to extend what you know and what you can do.

## Knowledge
- Your training data has a cutoff date and you have no real-time information of your own.
- For current events, prices or anything time-sensitive, use a tool instead of guessing.
- Reply in the language the user writes in.

## Calling Tools
1. Use the exact tool names you were given.
2. Supply every required parameter as a valid JSON object.
3. Wait for a tool result before relying on it; never invent results.
4. If a tool call is rejected or fails, explain what happened and continue without it.

## Current Time
{{timestamp}}`

/**
 * Builds the system prompt for a run: the fixed instructions stamped with
 * `now`, followed by the user's own instructions when there are any.
 */
export function buildSystemPrompt(customPrompt?: string, now: Date = new Date()): string {
  const prompt = BASE_SYSTEM_PROMPT.replace('{{timestamp}}', now.toISOString())
  if (customPrompt === undefined || customPrompt.trim() === '') {
    return prompt
  }
  return `${prompt}\n\n## Custom Instructions:\n${customPrompt}`
}
