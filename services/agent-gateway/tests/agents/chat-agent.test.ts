import { beforeEach, describe, expect, it, vi } from 'vitest';
import { AgentStreamEvent, ChatAgent } from '../../src/agents/chat-agent.js';
import { AgentTool } from '../../src/agents/tools/types.js';
import { LlmProviderError } from '../../src/errors/index.js';
import { makeInstance, ScriptedLlmClient } from '../helpers.js';

const modelSettings = { model: 'acme/support-model', temperature: 0.5, maxTokens: 512 };

function lookupTool(): AgentTool {
  return {
    definition: { name: 'lookup', description: 'Look something up', parameters: { type: 'object' } },
    promptGuidance: 'Use lookup for facts.',
    execute: vi.fn(async (args: unknown) => `looked up ${JSON.stringify(args)}`),
  };
}

const explodingTool: AgentTool = {
  definition: { name: 'explode', description: 'Always fails', parameters: { type: 'object' } },
  promptGuidance: 'Never use explode.',
  execute: async () => {
    throw new Error('boom');
  },
};

async function collect(stream: AsyncGenerator<AgentStreamEvent>): Promise<AgentStreamEvent[]> {
  const events: AgentStreamEvent[] = [];
  for await (const event of stream) {
    events.push(event);
  }
  return events;
}

describe('ChatAgent', () => {
  let llm: ScriptedLlmClient;

  beforeEach(() => {
    llm = new ScriptedLlmClient();
  });

  function createAgent(tools: AgentTool[] = [], maxToolRounds: number = 2): ChatAgent {
    return new ChatAgent({
      instance: makeInstance({ systemPrompt: 'Be brief.' }),
      llm,
      modelSettings,
      tools,
      maxToolRounds,
    });
  }

  describe('run', () => {
    it('sends the system prompt, user and assistant history, then the new message', async () => {
      llm.queueReply('We open at 9.');
      const agent = createAgent();

      const result = await agent.run({
        message: 'And on Saturday?',
        history: [
          { role: 'user', content: 'When do you open?' },
          { role: 'assistant', content: 'At 9 on weekdays.' },
          { role: 'system', content: 'internal note' },
        ],
        sessionId: 'session-1',
      });

      expect(llm.requests[0]).toEqual({
        model: 'acme/support-model',
        temperature: 0.5,
        maxTokens: 512,
        tools: undefined,
        messages: [
          { role: 'system', content: 'Be brief.\n\nYou are Acme Support.' },
          { role: 'user', content: 'When do you open?' },
          { role: 'assistant', content: 'At 9 on weekdays.' },
          { role: 'user', content: 'And on Saturday?' },
        ],
      });
      expect(result).toMatchObject({
        content: 'We open at 9.',
        model: 'acme/support-model',
        responseId: 'gen-1',
        finishReason: 'stop',
        rounds: 1,
        toolCalls: [],
        usage: { promptTokens: 10, completionTokens: 5, totalTokens: 15 },
        providerCost: null,
      });
    });

    it('runs requested tools and feeds their output back', async () => {
      const tool = lookupTool();
      llm
        .queueToolCalls([{ id: 'call-1', name: 'lookup', arguments: '{"q":"hours"}' }], { providerCost: { totalCost: 0.001 } })
        .queueReply('Open 9 to 5.', { providerCost: { totalCost: 0.002 } });
      const agent = createAgent([tool]);

      const result = await agent.run({ message: 'Hours?', history: [], sessionId: 'session-1' });

      expect(tool.execute).toHaveBeenCalledWith(
        { q: 'hours' },
        expect.objectContaining({ sessionId: 'session-1' })
      );
      expect(result.content).toBe('Open 9 to 5.');
      expect(result.rounds).toBe(2);
      expect(result.toolCalls).toEqual([
        { id: 'call-1', name: 'lookup', arguments: '{"q":"hours"}', output: 'looked up {"q":"hours"}' },
      ]);
      expect(result.usage).toEqual({ promptTokens: 20, completionTokens: 10, totalTokens: 30 });
      expect(result.providerCost?.totalCost).toBeCloseTo(0.003, 10);

      expect(llm.requests[0].tools?.map(definition => definition.name)).toEqual(['lookup']);
      expect(llm.requests[1].messages.slice(2)).toEqual([
        { role: 'assistant', content: null, toolCalls: [{ id: 'call-1', name: 'lookup', arguments: '{"q":"hours"}' }] },
        { role: 'tool', content: 'looked up {"q":"hours"}', toolCallId: 'call-1' },
      ]);
      expect(result.requestMessages).toHaveLength(4);
    });

    it('withholds tools once the round limit is reached', async () => {
      llm
        .queueToolCalls([{ id: 'call-1', name: 'lookup', arguments: '{}' }])
        .queueToolCalls([{ id: 'call-2', name: 'lookup', arguments: '{}' }])
        .queueReply('Final answer.', { toolCalls: [{ id: 'call-3', name: 'lookup', arguments: '{}' }] });
      const agent = createAgent([lookupTool()], 2);

      const result = await agent.run({ message: 'Dig deep', history: [], sessionId: 'session-1' });

      expect(result.content).toBe('Final answer.');
      expect(result.rounds).toBe(3);
      expect(result.toolCalls.map(call => call.id)).toEqual(['call-1', 'call-2']);
      expect(llm.requests[2].tools).toBeUndefined();
    });

    it('never offers tools when the round limit is zero', async () => {
      llm.queueReply('Plain answer.');
      const agent = createAgent([lookupTool()], 0);

      await agent.run({ message: 'Hi', history: [], sessionId: 'session-1' });

      expect(llm.requests[0].tools).toBeUndefined();
    });

    it('turns tool failures into tool results', async () => {
      llm
        .queueToolCalls([
          { id: 'a', name: 'nope', arguments: '{}' },
          { id: 'b', name: 'lookup', arguments: '{not json' },
          { id: 'c', name: 'lookup', arguments: '' },
          { id: 'd', name: 'explode', arguments: '{}' },
        ])
        .queueReply('Sorry about that.');
      const agent = createAgent([lookupTool(), explodingTool]);

      const result = await agent.run({ message: 'Try everything', history: [], sessionId: 'session-1' });

      expect(result.toolCalls.map(call => call.output)).toEqual([
        'Error: unknown tool "nope"',
        'Error: arguments for lookup are not valid JSON',
        'looked up {}',
        'Error: explode failed: boom',
      ]);
      expect(result.content).toBe('Sorry about that.');
    });

    it('propagates provider errors', async () => {
      llm.queueError(new LlmProviderError('OpenRouter request failed with status 503: overloaded', 503, true));
      const agent = createAgent();

      await expect(agent.run({ message: 'Hi', history: [], sessionId: 'session-1' })).rejects.toThrow(
        'OpenRouter request failed with status 503: overloaded'
      );
    });
  });

  describe('runStream', () => {
    it('yields chunks, then the finished result', async () => {
      llm.queueReply('Hello there', {}, ['Hello', ' there']);
      const agent = createAgent();

      const events = await collect(agent.runStream({ message: 'Hi', history: [], sessionId: 'session-1' }));

      expect(events.slice(0, 2)).toEqual([
        { type: 'chunk', content: 'Hello' },
        { type: 'chunk', content: ' there' },
      ]);
      const last = events[2];
      expect(last.type === 'done' ? last.result.content : null).toBe('Hello there');
      expect(events).toHaveLength(3);
    });

    it('streams the answer that follows a tool round', async () => {
      llm
        .queueToolCalls([{ id: 'call-1', name: 'lookup', arguments: '{"q":"x"}' }])
        .queueReply('Found it.', {}, ['Found', ' it.']);
      const agent = createAgent([lookupTool()]);

      const events = await collect(agent.runStream({ message: 'Look', history: [], sessionId: 'session-1' }));

      expect(events.filter(event => event.type === 'chunk')).toHaveLength(2);
      const last = events[events.length - 1];
      expect(last.type === 'done' ? last.result.rounds : null).toBe(2);
    });
  });

  it('exposes its provider and tools', () => {
    const agent = createAgent([lookupTool()]);

    expect(agent.provider).toBe('scripted');
    expect(agent.toolNames).toEqual(['lookup']);
    expect(agent.systemPrompt).toBe('Be brief.\n\nYou are Acme Support.\n\nUse lookup for facts.');
  });
});
