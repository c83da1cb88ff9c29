import { describe, it } from 'node:test'
import assert from 'node:assert/strict'
import { AnthropicStreamAdapter } from '../src/agents/providers/anthropic.js'
import { MalformedPayloadError, ProviderError, TransportError } from '../src/agents/errors.js'
import { claude, feed } from './helpers.js'

describe('AnthropicStreamAdapter', () => {
  it('streams text blocks into tokens and ends with usage', () => {
    const adapter = new AnthropicStreamAdapter()
    const result = feed(adapter, [
      claude.messageStart(12),
      claude.textStart(0),
      claude.textDelta(0, 'Hello'),
      claude.textDelta(0, ' world'),
      claude.blockStop(0),
      claude.messageDelta('end_turn', 5),
      claude.messageStop(),
    ])

    assert.equal(result.error, undefined)
    assert.deepEqual(result.chunks, [
      { type: 'token', text: 'Hello' },
      { type: 'token', text: ' world' },
      { type: 'end', stopReason: 'end_turn', usage: { inputTokens: 12, outputTokens: 5 } },
    ])
    assert.deepEqual(adapter.state, { kind: 'done' })
  })

  it('ignores ping events', () => {
    const result = feed(new AnthropicStreamAdapter(), [
      { type: 'ping' },
      claude.textStart(0),
      claude.textDelta(0, 'ok'),
      claude.blockStop(0),
      claude.messageStop(),
    ])

    assert.deepEqual(result.chunks, [{ type: 'token', text: 'ok' }, { type: 'end' }])
  })

  it('streams a tool_use block as a bracketed tool call', () => {
    const adapter = new AnthropicStreamAdapter()
    const result = feed(adapter, [
      claude.messageStart(12),
      claude.textStart(0),
      claude.textDelta(0, 'Checking.'),
      claude.blockStop(0),
      claude.toolStart(1, 'toolu_1', 'get_weather'),
      claude.jsonDelta(1, ''),
      claude.jsonDelta(1, '{"city":'),
      claude.jsonDelta(1, '"Paris"}'),
      claude.blockStop(1),
      claude.messageDelta('tool_use', 20),
      claude.messageStop(),
    ])

    assert.equal(result.error, undefined)
    assert.deepEqual(result.chunks, [
      { type: 'token', text: 'Checking.' },
      { type: 'tool_call_start', callId: 'toolu_1', name: 'get_weather' },
      { type: 'tool_call_argument', callId: 'toolu_1', fragment: '{"city":' },
      { type: 'tool_call_argument', callId: 'toolu_1', fragment: '"Paris"}' },
      { type: 'tool_call_end', callId: 'toolu_1' },
      { type: 'end', stopReason: 'tool_use', usage: { inputTokens: 12, outputTokens: 20 } },
    ])
  })

  it('reports the open tool call in its state', () => {
    const adapter = new AnthropicStreamAdapter()
    adapter.push(claude.toolStart(0, 'toolu_9', 'lookup'))

    assert.deepEqual(adapter.state, { kind: 'in_tool_call', callIds: ['toolu_9'] })
    adapter.push(claude.blockStop(0))
    assert.deepEqual(adapter.state, { kind: 'idle' })
  })

  it('streams thinking blocks and skips signatures', () => {
    const result = feed(new AnthropicStreamAdapter(), [
      claude.thinkingStart(0),
      claude.thinkingDelta(0, 'Two plus two'),
      { type: 'content_block_delta', index: 0, delta: { type: 'signature_delta', signature: 'sig' } },
      claude.blockStop(0),
      claude.textStart(1),
      claude.textDelta(1, '4'),
      claude.blockStop(1),
      claude.messageDelta('end_turn', 8),
      claude.messageStop(),
    ])

    assert.deepEqual(result.chunks, [
      { type: 'thinking', text: 'Two plus two' },
      { type: 'token', text: '4' },
      { type: 'end', stopReason: 'end_turn', usage: { inputTokens: 0, outputTokens: 8 } },
    ])
  })

  it('maps refusal to content_filter', () => {
    const result = feed(new AnthropicStreamAdapter(), [
      claude.messageDelta('refusal', 1),
      claude.messageStop(),
    ])

    assert.deepEqual(result.chunks, [
      { type: 'end', stopReason: 'content_filter', usage: { inputTokens: 0, outputTokens: 1 } },
    ])
  })

  it('rejects an unknown event type with the raw frame attached', () => {
    const adapter = new AnthropicStreamAdapter()
    const frame = { type: 'mystery' }
    const result = feed(adapter, [claude.messageStart(), frame, claude.messageStop()])

    assert.ok(result.error instanceof MalformedPayloadError)
    assert.equal(result.error.raw, '{"type":"mystery"}')
    assert.equal(result.consumed, 2)
    assert.equal(adapter.state.kind, 'errored')
    assert.throws(() => adapter.push(claude.messageStop()), /after it terminated/)
  })

  it('rejects a delta for a block other than the open one', () => {
    const result = feed(new AnthropicStreamAdapter(), [
      claude.toolStart(0, 'toolu_1', 'lookup'),
      claude.jsonDelta(1, '{}'),
    ])

    assert.ok(result.error instanceof MalformedPayloadError)
    assert.equal(
      result.error.message,
      'Malformed anthropic payload: input_json_delta for block 1 while block 0 is open',
    )
    assert.deepEqual(result.chunks, [{ type: 'tool_call_start', callId: 'toolu_1', name: 'lookup' }])
  })

  it('rejects a delta with no open block', () => {
    const result = feed(new AnthropicStreamAdapter(), [claude.textDelta(0, 'x')])

    assert.ok(result.error instanceof MalformedPayloadError)
    assert.equal(result.error.message, 'Malformed anthropic payload: text_delta for block 0 with no open block')
  })

  it('rejects a delta that does not fit the block type', () => {
    const result = feed(new AnthropicStreamAdapter(), [
      claude.textStart(0),
      claude.jsonDelta(0, '{}'),
    ])

    assert.ok(result.error instanceof MalformedPayloadError)
    assert.equal(result.error.message, 'Malformed anthropic payload: input_json_delta inside a text block')
  })

  it('rejects message_stop while a tool call is still open', () => {
    const result = feed(new AnthropicStreamAdapter(), [
      claude.toolStart(0, 'toolu_1', 'lookup'),
      claude.jsonDelta(0, '{}'),
      claude.messageStop(),
    ])

    assert.ok(result.error instanceof MalformedPayloadError)
    assert.equal(result.error.message, 'Malformed anthropic payload: message_stop while block 0 is open')
    assert.equal(result.chunks.some((c) => c.type === 'end'), false)
  })

  it('rejects a reused tool call id', () => {
    const result = feed(new AnthropicStreamAdapter(), [
      claude.toolStart(0, 'toolu_1', 'lookup'),
      claude.blockStop(0),
      claude.toolStart(1, 'toolu_1', 'lookup'),
    ])

    assert.ok(result.error instanceof MalformedPayloadError)
    assert.equal(result.error.message, 'Malformed anthropic payload: duplicate tool call id toolu_1')
  })

  it('turns an error event into a provider error after earlier chunks', () => {
    const result = feed(new AnthropicStreamAdapter(), [
      claude.textStart(0),
      claude.textDelta(0, 'partial'),
      { type: 'error', error: { type: 'overloaded_error', message: 'Overloaded' } },
    ])

    assert.deepEqual(result.chunks, [{ type: 'token', text: 'partial' }])
    assert.ok(result.error instanceof ProviderError)
    assert.equal(result.error.message, 'Overloaded')
    assert.equal(result.error.code, 'overloaded_error')
  })

  it('treats a connection that closes before message_stop as a transport error', () => {
    const result = feed(new AnthropicStreamAdapter(), [
      claude.textStart(0),
      claude.textDelta(0, 'cut'),
    ])

    assert.deepEqual(result.chunks, [{ type: 'token', text: 'cut' }])
    assert.ok(result.error instanceof TransportError)
    assert.equal(result.error.message, 'anthropic connection closed before the end of the stream')
  })
})
