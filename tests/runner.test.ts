import { describe, it } from 'node:test'
import assert from 'node:assert/strict'
import { z } from 'zod'
import { runConversation } from '../src/agents/runner.js'
import { OpenAIStreamAdapter } from '../src/agents/providers/openai.js'
import { ToolRegistry } from '../src/tools/registry.js'
import { TokenStream } from '../src/streaming/token-stream.js'
import { MalformedPayloadError } from '../src/agents/errors.js'
import type {
  Backend,
  Chunk,
  Message,
  PromptOptionsInput,
} from '../src/agents/providers/types.js'
import { chatChunk, ScriptedTransport } from './helpers.js'

/** Replays one scripted response per prompt. */
class ScriptedBackend implements Backend {
  readonly id = 'scripted'
  readonly model = 'scripted-model'
  readonly prompts: Array<{ messages: Message[]; options?: PromptOptionsInput }> = []

  constructor(private readonly turns: unknown[][]) {}

  prompt(messages: readonly Message[], options?: PromptOptionsInput): TokenStream {
    this.prompts.push({ messages: [...messages], options })
    const frames = this.turns[this.prompts.length - 1] ?? []
    return new TokenStream(ScriptedTransport.of(frames), new OpenAIStreamAdapter())
  }
}

const toolCallTurn = (args: string) => [
  chatChunk({ tool_calls: [{ index: 0, id: 'call_1', type: 'function', function: { name: 'get_weather', arguments: args } }] }),
  chatChunk({}, 'tool_calls'),
]
const answerTurn = (text: string) => [chatChunk({ content: text }), chatChunk({}, 'stop')]

function weatherRegistry() {
  return new ToolRegistry().register(
    'get_weather',
    z.object({ city: z.string() }),
    ({ city }) => `sunny in ${city}`,
    { description: 'Current weather' },
  )
}

describe('runConversation', () => {
  it('dispatches tool calls and prompts again until the model answers', async () => {
    const backend = new ScriptedBackend([toolCallTurn('{"city":"Paris"}'), answerTurn('It is sunny.')])
    const seen: Chunk['type'][] = []
    const input: Message[] = [{ role: 'user', content: 'Weather in Paris?' }]

    const result = await runConversation({
      backend,
      messages: input,
      registry: weatherRegistry(),
      onChunk: (c) => seen.push(c.type),
    })

    assert.equal(result.turns, 2)
    assert.equal(result.response.text, 'It is sunny.')
    assert.deepEqual(result.messages, [
      { role: 'user', content: 'Weather in Paris?' },
      {
        role: 'assistant',
        content: '',
        toolCalls: [{ callId: 'call_1', name: 'get_weather', arguments: '{"city":"Paris"}' }],
      },
      { role: 'tool_result', callId: 'call_1', content: 'sunny in Paris' },
      { role: 'assistant', content: 'It is sunny.' },
    ])
    assert.deepEqual(seen, [
      'tool_call_start', 'tool_call_argument', 'tool_call_end', 'end',
      'token', 'end',
    ])
    assert.equal(input.length, 1)
    assert.equal(backend.prompts[1]?.messages.length, 3)
    assert.deepEqual(backend.prompts[0]?.options?.tools, [
      { name: 'get_weather', description: 'Current weather', inputSchema: { type: 'object' } },
    ])
  })

  it('reports a tool error back to the model', async () => {
    const backend = new ScriptedBackend([toolCallTurn('{"city":42}'), answerTurn('Sorry.')])

    const result = await runConversation({
      backend,
      messages: [{ role: 'user', content: 'Weather?' }],
      registry: weatherRegistry(),
    })

    assert.deepEqual(result.messages[2], {
      role: 'tool_result',
      callId: 'call_1',
      content: 'Invalid arguments for tool "get_weather": city: Expected string, received number',
      isError: true,
    })
    assert.equal(result.turns, 2)
  })

  it('answers tool calls with an error when no registry is given', async () => {
    const backend = new ScriptedBackend([toolCallTurn('{}'), answerTurn('Ok.')])

    const result = await runConversation({ backend, messages: [{ role: 'user', content: 'Hi' }] })

    assert.deepEqual(result.messages[2], {
      role: 'tool_result',
      callId: 'call_1',
      content: 'No tools are available',
      isError: true,
    })
  })

  it('gives up after maxTurns', async () => {
    const backend = new ScriptedBackend([toolCallTurn('{"city":"Oslo"}'), toolCallTurn('{"city":"Oslo"}')])

    await assert.rejects(
      runConversation({
        backend,
        messages: [{ role: 'user', content: 'Loop' }],
        registry: weatherRegistry(),
        maxTurns: 1,
      }),
      /Conversation did not finish within 1 turns/,
    )
  })

  it('propagates stream errors', async () => {
    const backend = new ScriptedBackend([[chatChunk({ content: 'a' }), { bogus: true }]])

    await assert.rejects(
      runConversation({ backend, messages: [{ role: 'user', content: 'Hi' }] }),
      MalformedPayloadError,
    )
  })
})
