import { createInterface } from 'node:readline/promises'
import { z } from 'zod'
import { Agent, createAgentFromSettings, loadSettings, tool } from '../../../src/index.js'

const weatherTool = tool({
  name: 'get_weather',
  description: 'Get the current weather for a specific location.',
  inputSchema: z.object({
    location: z.string().describe('The city and state, e.g., San Francisco, CA'),
  }),
  callback: (input) => {
    const fakeWeatherData = {
      temperature: '22°C',
      conditions: 'sunny',
    }

    return `The weather in ${input.location} is ${fakeWeatherData.temperature} and ${fakeWeatherData.conditions}.`
  },
})

/**
 * Prints streamed text and asks on the terminal before every tool call that
 * needs approval.
 * @param agent The agent to watch.
 */
function attachConsole(agent: Agent): () => void {
  const terminal = createInterface({ input: process.stdin, output: process.stdout })

  const unsubscribe = agent.subscribe(({ state, delta }) => {
    if (delta?.type === 'textAppended') {
      process.stdout.write(delta.text)
      return
    }
    if (delta !== undefined) return

    if (state.type === 'awaitingApproval') {
      const { id, toolName, arguments: args } = state.proposal
      terminal
        .question(`\nRun ${toolName} ${args}? [y/N] `)
        .then((answer) => (answer.trim().toLowerCase() === 'y' ? agent.approve(id) : agent.reject(id)))
        .catch(console.error)
    } else if (state.type === 'executingTool') {
      console.log(`\n[tool] ${state.proposal.toolName}`)
    }
  })

  return () => {
    unsubscribe()
    terminal.close()
  }
}

async function main() {
  // 1. Settings from agent.yaml (when present) and the environment
  const settings = loadSettings({ file: process.env['AGENT_CONFIG'] })

  // 2. Create the agent with the default tools plus the weather tool
  const agent = createAgentFromSettings(settings, { tools: [weatherTool] })
  const detach = attachConsole(agent)

  const prompt = process.argv.slice(2).join(' ') || 'What is the weather in Toronto? Use the weather tool.'
  console.log(`User: ${prompt}\n`)

  const result = await agent.start(prompt)
  detach()

  console.log(`\n\n::Run ended in state ${result.state.type}`)
  if (result.state.type === 'failed') {
    console.log(`::Reason: ${result.state.reason}`)
  }
}

await main().catch(console.error)
