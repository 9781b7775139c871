// Static agent-name → implementation map

import type { Agent, AgentName } from '../types/agents.js';
import type { AgentDeps } from '../agents/base-agent.js';
import { FinancialAgent } from '../agents/financial-agent.js';
import { RiskAgent } from '../agents/risk-agent.js';
import { ConsistencyAgent } from '../agents/consistency-agent.js';
import { MemoAgent } from '../agents/memo-agent.js';
import { QuoteAgent } from '../agents/quote-agent.js';
import { ChartAgent } from '../agents/chart-agent.js';
import type { ModelClient } from '../bridge/model-client.js';
import type { Logger } from '../utils/logger.js';

export type AgentSet = { [N in AgentName]: Agent<N> };

const FACTORY: { [N in AgentName]: (deps: AgentDeps) => Agent<N> } = {
  financial: (deps) => new FinancialAgent(deps),
  risk: (deps) => new RiskAgent(deps),
  consistency: (deps) => new ConsistencyAgent(deps),
  memo: (deps) => new MemoAgent(deps),
  quote: (deps) => new QuoteAgent(deps),
  chart: (deps) => new ChartAgent(deps),
};

export function createAgent<N extends AgentName>(name: N, deps: AgentDeps): Agent<N> {
  return FACTORY[name](deps);
}

export interface AgentSetDeps {
  model: ModelClient;
  /** Model identifier per agent */
  models?: Partial<Record<AgentName, string>>;
  logger?: Logger;
}

export function createAgentSet(deps: AgentSetDeps): AgentSet {
  const forAgent = (name: AgentName): AgentDeps => ({
    model: deps.model,
    modelId: deps.models?.[name],
    logger: deps.logger,
  });
  return {
    financial: createAgent('financial', forAgent('financial')),
    risk: createAgent('risk', forAgent('risk')),
    consistency: createAgent('consistency', forAgent('consistency')),
    memo: createAgent('memo', forAgent('memo')),
    quote: createAgent('quote', forAgent('quote')),
    chart: createAgent('chart', forAgent('chart')),
  };
}
