import { describe, expect, it } from 'vitest';
import { buildSystemPrompt, DEFAULT_SYSTEM_PROMPT } from '../../src/agents/prompt-builder.js';
import { AgentTool } from '../../src/agents/tools/types.js';
import { makeInstance } from '../helpers.js';

const searchTool: AgentTool = {
  definition: { name: 'search', description: 'Search', parameters: { type: 'object' } },
  promptGuidance: 'Use the search tool for product questions.',
  execute: async () => '',
};

describe('buildSystemPrompt', () => {
  it('prefers system_prompt.md', () => {
    const instance = makeInstance({ systemPrompt: 'You answer billing questions.\n', config: { system_prompt: 'Inline' } });

    expect(buildSystemPrompt(instance, [])).toBe('You answer billing questions.\n\nYou are Acme Support.');
  });

  it('uses the inline system_prompt when the file is blank or missing', () => {
    expect(buildSystemPrompt(makeInstance({ systemPrompt: '   ', config: { system_prompt: ' Inline prompt ' } }), [])).toBe(
      'Inline prompt\n\nYou are Acme Support.'
    );
  });

  it('falls back to the default prompt', () => {
    expect(buildSystemPrompt(makeInstance({ config: { system_prompt: 42 } }), [])).toBe(
      `${DEFAULT_SYSTEM_PROMPT}\n\nYou are Acme Support.`
    );
  });

  it('appends guidance for each enabled tool', () => {
    expect(buildSystemPrompt(makeInstance({ systemPrompt: 'Base.' }), [searchTool])).toBe(
      'Base.\n\nYou are Acme Support.\n\nUse the search tool for product questions.'
    );
  });
});
