// Base agent: one (prompt, model call, extract, normalize) pass per execute()
// execute() never throws; every failure comes back as an error result

import type {
  Agent, AgentContext, AgentName, AgentOutputs, AgentResult, ExecuteOptions,
} from '../types/agents.js';
import type { ModelClient } from '../bridge/model-client.js';
import type { AgentOutputSchema } from '../schemas/field-spec.js';
import { describeSchema, schemaRules } from '../schemas/describe.js';
import { formatIssue, type NormalizeResult } from '../schemas/normalize.js';
import { extractBlock, type BlockKind } from '../utils/response-extractor.js';
import { ExtractionFailure, ValidationImpossible, toErrorMessage } from '../utils/errors.js';
import { truncate } from '../utils/prompt.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { DEFAULT_MODEL } from '../config/index.js';

export interface AgentDeps {
  model: ModelClient;
  /** Model identifier passed to the client; defaults to DEFAULT_MODEL */
  modelId?: string;
  logger?: Logger;
}

export abstract class BaseAgent<N extends AgentName> implements Agent<N> {
  abstract readonly name: N;
  /** Input budget in characters */
  abstract readonly budget: number;
  protected abstract readonly schema: AgentOutputSchema;
  protected readonly blockKind: BlockKind = 'object';

  protected readonly model: ModelClient;
  readonly modelId: string;
  private readonly injectedLogger?: Logger;
  private scopedLogger?: Logger;

  constructor(deps: AgentDeps) {
    this.model = deps.model;
    this.modelId = deps.modelId ?? DEFAULT_MODEL;
    this.injectedLogger = deps.logger;
  }

  protected get logger(): Logger {
    if (!this.scopedLogger) {
      this.scopedLogger = this.injectedLogger ?? createLogger(`Agent:${this.name}`);
    }
    return this.scopedLogger;
  }

  abstract buildPrompt(text: string, context: AgentContext): string;

  /** Normalize the extracted block (undefined when none could be extracted) into this agent's output. */
  protected abstract parse(raw: unknown): NormalizeResult<AgentOutputs[N]>;

  protected documentText(text: string): string {
    return truncate(text, this.budget);
  }

  /** Schema skeleton plus explicit field rules, shared by every prompt template. */
  protected outputFormat(): string {
    const rules = schemaRules(this.schema);
    return [
      'The output MUST follow this EXACT structure:',
      '',
      describeSchema(this.schema),
      '',
      'IMPORTANT:',
      '- All fields must be present',
      ...rules,
    ].join('\n');
  }

  async execute(text: string, context: AgentContext, options: ExecuteOptions = {}): Promise<AgentResult<N>> {
    const started = Date.now();
    const log: string[] = [];
    const trace = (message: string) => log.push(`[${new Date().toISOString()}] ${message}`);

    try {
      const prompt = this.buildPrompt(text, context);
      trace(`prompt built (${prompt.length} chars, model ${this.modelId})`);

      const response = await this.model.complete(prompt, this.modelId, { signal: options.signal });
      trace(`model responded (${response.length} chars)`);

      let raw: unknown;
      try {
        raw = extractBlock(response, this.blockKind);
      } catch (err) {
        if (!(err instanceof ExtractionFailure)) throw err;
        trace(`${err.message}; falling back to schema defaults`);
        this.logger.warn('extraction failed, using defaults', { error: err.message });
      }

      const { value, issues } = this.parse(raw);
      for (const issue of issues) trace(`normalize: ${formatIssue(issue)}`);
      trace(`completed with ${issues.length} normalization issue(s)`);

      return {
        agent: this.name,
        status: 'success',
        output: value,
        error: null,
        log,
        durationMs: Date.now() - started,
      };
    } catch (err) {
      const message = toErrorMessage(err);
      trace(`failed: ${message}`);
      if (err instanceof ValidationImpossible) {
        this.logger.error('normalizer produced a non-conforming value', { problems: err.problems });
      } else {
        this.logger.error('execution failed', { error: message });
      }
      return {
        agent: this.name,
        status: 'error',
        output: null,
        error: message,
        log,
        durationMs: Date.now() - started,
      };
    }
  }
}
