// In-process stand-in for the hosted model: replies by recognizing which agent wrote the prompt

import { vi } from 'vitest';
import type { CompleteOptions, ModelClient } from '../bridge/model-client.js';
import type { AgentName } from '../types/agents.js';

const ROLE_PREFIX: ReadonlyArray<readonly [AgentName, string]> = [
  ['financial', 'You are a financial analyst'],
  ['risk', 'You are a risk analyst'],
  ['consistency', 'You are a consistency analyst'],
  ['memo', 'You are a senior private equity analyst'],
  ['quote', 'You are an expert at identifying significant quotes'],
  ['chart', 'You are an expert at analyzing charts'],
];

export function agentForPrompt(prompt: string): AgentName | undefined {
  return ROLE_PREFIX.find(([, prefix]) => prompt.startsWith(prefix))?.[0];
}

export type FakeReply = string | Error | ((prompt: string) => string);

const DEFAULT_REPLY: Record<AgentName, string> = {
  financial: '[]',
  risk: '{}',
  consistency: '{}',
  memo: '{}',
  quote: '{}',
  chart: '{}',
};

export function fakeModel(replies: Partial<Record<AgentName, FakeReply>> = {}) {
  const prompts: Partial<Record<AgentName, string[]>> = {};
  const complete = vi.fn(async (prompt: string, _model: string, _options?: CompleteOptions): Promise<string> => {
    const agent = agentForPrompt(prompt);
    if (!agent) throw new Error('prompt from an unknown agent');
    (prompts[agent] ??= []).push(prompt);

    const reply = replies[agent] ?? DEFAULT_REPLY[agent];
    if (reply instanceof Error) throw reply;
    return typeof reply === 'function' ? reply(prompt) : reply;
  });
  const model: ModelClient = { complete };
  return { model, complete, prompts };
}
