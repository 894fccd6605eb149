import { beforeEach, describe, expect, it } from 'vitest';
import { InstanceNotFoundError, LlmProviderError, ValidationError } from '../../src/errors/index.js';
import { ChatStreamEvent } from '../../src/services/chat-service.js';
import { DEFAULT_POOL_ID } from '../../src/services/pool-manager.js';
import { LlmRequestRecord } from '../../src/types/index.js';
import { createHarness, GatewayHarness } from '../helpers.js';

describe('ChatService', () => {
  let harness: GatewayHarness;

  beforeEach(async () => {
    harness = await createHarness();
  });

  function storedRequests(): LlmRequestRecord[] {
    return Array.from(harness.store.llmRequests.rows.values());
  }

  async function collect(stream: AsyncGenerator<ChatStreamEvent>): Promise<ChatStreamEvent[]> {
    const events: ChatStreamEvent[] = [];
    for await (const event of stream) {
      events.push(event);
    }
    return events;
  }

  describe('validateMessage', () => {
    it('trims the message', () => {
      expect(harness.services.chat.validateMessage('  hello  ')).toBe('hello');
    });

    it('rejects missing, blank and non-string messages', () => {
      for (const message of [undefined, '', '   ', 42]) {
        expect(() => harness.services.chat.validateMessage(message)).toThrow(
          'message is required and must be a non-empty string'
        );
      }
    });

    it('rejects messages over the configured length', () => {
      expect(() => harness.services.chat.validateMessage('x'.repeat(201))).toThrow(
        new ValidationError('message exceeds the maximum length of 200 characters').message
      );
      expect(harness.services.chat.validateMessage('x'.repeat(200))).toHaveLength(200);
    });
  });

  describe('chat', () => {
    it('answers, prices and persists a turn', async () => {
      harness.llm.queueReply('Our plans start at $10.');

      const result = await harness.services.chat.chat({
        accountSlug: 'acme',
        instanceSlug: 'sales',
        message: 'How much is it?',
        session: null,
      });

      expect(result.response).toBe('Our plans start at $10.');
      expect(result.model).toBe('fixture/global-model');
      expect(result.usage).toEqual({ promptTokens: 10, completionTokens: 5, totalTokens: 15 });
      expect(result.cost.method).toBe('fallback_pricing');
      expect(result.cost.totalCost).toBeCloseTo(0.000015, 12);
      expect(result.session.agentInstanceSlug).toBe('sales');

      const [record] = storedRequests();
      expect(record).toMatchObject({
        id: result.llmRequestId,
        sessionId: result.sessionId,
        accountSlug: 'acme',
        agentInstanceSlug: 'sales',
        provider: 'scripted',
        model: 'fixture/global-model',
        completionStatus: 'complete',
        costMethod: 'fallback_pricing',
      });
      expect(record.requestBody).toMatchObject({ model: 'fixture/global-model', temperature: 0.5, max_tokens: 256 });
      expect(record.responseBody).toMatchObject({ content: 'Our plans start at $10.', rounds: 1, tool_calls: [] });

      const messages = await harness.services.messages.getSessionMessages(result.sessionId);
      expect(messages.map(message => [message.role, message.content, message.llmRequestId])).toEqual([
        ['user', 'How much is it?', null],
        ['assistant', 'Our plans start at $10.', result.llmRequestId],
      ]);
      expect(messages[1].meta).toEqual({ model: 'fixture/global-model', stream: false, toolCalls: [] });

      const pool = harness.services.pools.getPool(DEFAULT_POOL_ID)?.getMetrics();
      expect(pool).toMatchObject({ messageCount: 1, errorCount: 0 });
    });

    it('sends earlier turns of the session as history', async () => {
      harness.llm.queueReply('First answer.').queueReply('Second answer.');

      const first = await harness.services.chat.chat({ accountSlug: 'acme', instanceSlug: 'sales', message: 'First', session: null });
      await harness.services.chat.chat({ accountSlug: 'acme', instanceSlug: 'sales', message: 'Second', session: first.session });

      expect(harness.llm.requests[1].messages).toEqual([
        { role: 'system', content: 'You help with sales.\n\nYou are Acme Sales.' },
        { role: 'user', content: 'First' },
        { role: 'assistant', content: 'First answer.' },
        { role: 'user', content: 'Second' },
      ]);
    });

    it('limits history to the instance history_limit', async () => {
      harness.llm.queueReply('a1').queueReply('a2').queueReply('a3').queueReply('a4');
      const turn = { accountSlug: 'acme', instanceSlug: 'support' };

      const first = await harness.services.chat.chat({ ...turn, message: 'q1', session: null });
      await harness.services.chat.chat({ ...turn, message: 'q2', session: first.session });
      await harness.services.chat.chat({ ...turn, message: 'q3', session: first.session });
      await harness.services.chat.chat({ ...turn, message: 'q4', session: first.session });

      const sent = harness.llm.requests[3].messages.slice(1).map(message => message.content);
      expect(sent).toEqual(['q2', 'a2', 'q3', 'a3', 'q4']);
    });

    it('moves to a fresh session when switching instances', async () => {
      harness.llm.queueReply('Sales here.');
      const sales = await harness.services.chat.chat({ accountSlug: 'acme', instanceSlug: 'sales', message: 'Hi', session: null });

      const turn = await harness.services.chat.prepareTurn({
        accountSlug: 'acme',
        instanceSlug: 'support',
        message: 'Hi again',
        session: sales.session,
      });

      expect(turn.replacedSession).toBe(true);
      expect(turn.session.id).not.toBe(sales.sessionId);
      expect(turn.session.agentInstanceSlug).toBe('support');
      expect(turn.history).toEqual([]);
    });

    it('runs the vector search tool against the account knowledge base', async () => {
      harness.vectorStore.add('acme', [
        { id: 'hours', values: [1, 0], metadata: { title: 'Opening hours', text: 'Open 9 to 5.' } },
      ]);
      harness.llm
        .queueToolCalls([{ id: 'call-1', name: 'vector_search', arguments: '{"query":"opening hours"}' }])
        .queueReply('We are open 9 to 5.');

      const result = await harness.services.chat.chat({
        accountSlug: 'acme',
        instanceSlug: 'support',
        message: 'When are you open?',
        session: null,
      });

      expect(result.response).toBe('We are open 9 to 5.');
      expect(harness.llm.requests[1].messages[3]).toEqual({
        role: 'tool',
        content: 'Found 1 relevant result(s):\n\n1. Opening hours (relevance: 1.00)\nOpen 9 to 5.',
        toolCallId: 'call-1',
      });
      expect(result.usage.totalTokens).toBe(30);
      expect(result.cost.totalCost).toBeCloseTo(0.0001, 12);

      const [record] = storedRequests();
      expect(record.responseBody).toMatchObject({
        rounds: 2,
        tool_calls: [{ id: 'call-1', name: 'vector_search', arguments: '{"query":"opening hours"}' }],
      });
      const messages = await harness.services.messages.getSessionMessages(result.sessionId);
      expect(messages[1].meta['toolCalls']).toEqual(['vector_search']);
    });

    it('prefers the provider-reported cost', async () => {
      harness.llm.queueReply('Priced.', { providerCost: { totalCost: 0.5, promptCost: 0.2, completionCost: 0.3 } });

      const result = await harness.services.chat.chat({ accountSlug: 'acme', instanceSlug: 'sales', message: 'Hi', session: null });

      expect(result.cost).toEqual({ promptCost: 0.2, completionCost: 0.3, totalCost: 0.5, method: 'provider' });
    });

    it('substitutes a notice for an empty completion', async () => {
      harness.llm.queueReply('');

      const result = await harness.services.chat.chat({ accountSlug: 'acme', instanceSlug: 'sales', message: 'Hi', session: null });

      expect(result.response).toBe('I was unable to generate a response. Please try again.');
    });

    it('records a failed turn without saving messages', async () => {
      harness.llm.queueError(new LlmProviderError('OpenRouter request failed with status 503: overloaded', 503, true));

      const turn = await harness.services.chat.prepareTurn({
        accountSlug: 'acme',
        instanceSlug: 'sales',
        message: 'Hi',
        session: null,
      });
      await expect(harness.services.chat.runTurn(turn)).rejects.toThrow(LlmProviderError);

      const [record] = storedRequests();
      expect(record).toMatchObject({
        completionStatus: 'error',
        costMethod: 'unpriced',
        totalCost: 0,
        totalTokens: 0,
        model: 'fixture/global-model',
      });
      expect(record.responseBody).toEqual({
        content: '',
        error: 'OpenRouter request failed with status 503: overloaded',
        code: 'LLM_PROVIDER_ERROR',
        rounds: 0,
      });
      expect(await harness.services.messages.getMessageCount(turn.session.id)).toBe(0);
      expect(harness.services.pools.getPool(DEFAULT_POOL_ID)?.getMetrics().errorCount).toBe(1);
    });

    it('keeps the usage and cost of rounds that finished before a failure', async () => {
      harness.llm
        .queueToolCalls([{ id: 'call-1', name: 'vector_search', arguments: '{"query":"returns"}' }])
        .queueError(new LlmProviderError('OpenRouter request failed with status 502: bad gateway', 502, true));

      await expect(
        harness.services.chat.chat({ accountSlug: 'acme', instanceSlug: 'support', message: 'Returns?', session: null })
      ).rejects.toThrow('OpenRouter request failed with status 502: bad gateway');

      const [record] = storedRequests();
      expect(record).toMatchObject({
        completionStatus: 'error',
        costMethod: 'fallback_pricing',
        promptTokens: 10,
        completionTokens: 5,
        totalTokens: 15,
      });
      expect(record.totalCost).toBeCloseTo(0.00005, 12);
      expect(record.responseBody['rounds']).toBe(1);
    });

    it('rejects unknown instances before calling the model', async () => {
      await expect(
        harness.services.chat.chat({ accountSlug: 'acme', instanceSlug: 'missing', message: 'Hi', session: null })
      ).rejects.toThrow(InstanceNotFoundError);
      expect(harness.llm.requests).toEqual([]);
    });
  });

  describe('streamTurn', () => {
    it('streams chunks and finishes with the persisted result', async () => {
      harness.llm.queueReply('Hello there.', {}, ['Hello', ' there.']);
      const turn = await harness.services.chat.prepareTurn({
        accountSlug: 'globex',
        instanceSlug: 'helpdesk',
        message: 'Hi',
        session: null,
      });

      const events = await collect(harness.services.chat.streamTurn(turn));

      expect(events.slice(0, 2)).toEqual([
        { type: 'chunk', content: 'Hello' },
        { type: 'chunk', content: ' there.' },
      ]);
      const done = events[2];
      expect(done.type === 'done' ? done.data.response : null).toBe('Hello there.');

      const messages = await harness.services.messages.getSessionMessages(turn.session.id);
      expect(messages[1].meta).toMatchObject({ stream: true });
      expect(storedRequests()[0].requestBody['stream']).toBe(true);
    });

    it('records a partial turn when the consumer stops before the end', async () => {
      harness.llm.queueReply('Hello there.', {}, ['Hello', ' there.']);
      const turn = await harness.services.chat.prepareTurn({
        accountSlug: 'globex',
        instanceSlug: 'helpdesk',
        message: 'Hi',
        session: null,
      });

      for await (const event of harness.services.chat.streamTurn(turn)) {
        expect(event).toEqual({ type: 'chunk', content: 'Hello' });
        break;
      }

      const [record] = storedRequests();
      expect(record).toMatchObject({ completionStatus: 'partial', costMethod: 'unpriced', totalTokens: 0 });
      expect(record.responseBody).toMatchObject({
        content: 'Hello',
        code: 'CLIENT_DISCONNECTED',
        error: 'Client disconnected before the response finished',
      });
      expect(await harness.services.messages.getMessageCount(turn.session.id)).toBe(0);
      expect(harness.services.pools.getPool(DEFAULT_POOL_ID)?.getMetrics().errorCount).toBe(1);
    });

    it('records a partial turn when the stream breaks after content', async () => {
      harness.llm.queueError(new LlmProviderError('Stream error from provider: reset'), ['Partial ']);
      const turn = await harness.services.chat.prepareTurn({
        accountSlug: 'globex',
        instanceSlug: 'helpdesk',
        message: 'Hi',
        session: null,
      });

      const events: ChatStreamEvent[] = [];
      await expect(
        (async () => {
          for await (const event of harness.services.chat.streamTurn(turn)) {
            events.push(event);
          }
        })()
      ).rejects.toThrow('Stream error from provider: reset');

      expect(events).toEqual([{ type: 'chunk', content: 'Partial ' }]);
      const [record] = storedRequests();
      expect(record.completionStatus).toBe('partial');
      expect(record.responseBody['content']).toBe('Partial ');
    });
  });
});
