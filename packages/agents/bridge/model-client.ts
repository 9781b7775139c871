// Model invocation adapter: the single call-and-get-text boundary to the hosted model
// Retry, timeout and cancellation policy live here; agents make exactly one call

import { setTimeout as sleep } from 'node:timers/promises';
import type Anthropic from '@anthropic-ai/sdk';
import type { CimConfig, ModelSettings } from '../config/index.js';
import {
  ModelCancelled, ModelInvocationFailure, ModelTimeout, ModelUnavailable, toErrorMessage,
} from '../utils/errors.js';
import { createLogger, type Logger } from '../utils/logger.js';

export interface CompleteOptions {
  signal?: AbortSignal;
}

export interface ModelClient {
  complete(prompt: string, model: string, options?: CompleteOptions): Promise<string>;
}

const RETRIABLE_STATUS = new Set([408, 409, 429, 500, 502, 503, 504, 529]);

function errorStatus(err: unknown): number | undefined {
  if (err instanceof Error && 'status' in err && typeof err.status === 'number') return err.status;
  return undefined;
}

/** Maps an SDK or transport error onto the invocation failure taxonomy. */
export function classifyModelError(
  err: unknown,
  model: string,
  timeoutMs: number,
  signal?: AbortSignal,
): ModelInvocationFailure {
  if (err instanceof ModelInvocationFailure) return err;
  const name = err instanceof Error ? err.name : '';

  if (signal?.aborted || name === 'APIUserAbortError' || name === 'AbortError') {
    return new ModelCancelled(model, err);
  }
  if (name === 'APIConnectionTimeoutError' || name === 'TimeoutError') {
    return new ModelTimeout(model, timeoutMs, err);
  }
  const status = errorStatus(err);
  if (status !== undefined) {
    return new ModelUnavailable(model, `HTTP ${status}: ${toErrorMessage(err)}`, RETRIABLE_STATUS.has(status), err);
  }
  if (name === 'APIConnectionError') {
    return new ModelUnavailable(model, toErrorMessage(err), true, err);
  }
  return new ModelUnavailable(model, toErrorMessage(err), false, err);
}

export class AnthropicModelClient implements ModelClient {
  private clientPromise: Promise<Anthropic> | null = null;
  private readonly logger: Logger;

  constructor(
    private readonly settings: ModelSettings & { apiKey: string },
    logger?: Logger,
  ) {
    this.logger = logger ?? createLogger('ModelClient');
  }

  // Lazy-load the SDK so library users without a key never pay for it
  private getClient(): Promise<Anthropic> {
    if (!this.clientPromise) {
      const { apiKey } = this.settings;
      this.clientPromise = import('@anthropic-ai/sdk')
        .then(mod => new mod.default({ apiKey, maxRetries: 0 }))
        .catch((err: unknown) => {
          this.clientPromise = null;
          throw err;
        });
    }
    return this.clientPromise;
  }

  private async callOnce(prompt: string, model: string, signal?: AbortSignal): Promise<string> {
    const client = await this.getClient();
    const message = await client.messages.create(
      {
        model,
        max_tokens: this.settings.maxTokens,
        temperature: this.settings.temperature,
        messages: [{ role: 'user', content: prompt }],
      },
      { signal, timeout: this.settings.timeoutMs },
    );
    return message.content.flatMap(block => (block.type === 'text' ? [block.text] : [])).join('');
  }

  async complete(prompt: string, model: string, options: CompleteOptions = {}): Promise<string> {
    const { signal } = options;
    const { maxRetries, retryDelayMs, timeoutMs } = this.settings;

    for (let attempt = 0; ; attempt++) {
      if (signal?.aborted) throw new ModelCancelled(model, signal.reason);
      try {
        return await this.callOnce(prompt, model, signal);
      } catch (err) {
        const failure = classifyModelError(err, model, timeoutMs, signal);
        if (!failure.retriable || attempt >= maxRetries) throw failure;

        const delay = retryDelayMs * Math.pow(3, attempt);
        this.logger.warn(`attempt ${attempt + 1}/${maxRetries + 1} failed, retrying in ${delay}ms`, {
          model,
          error: failure.message,
        });
        try {
          await sleep(delay, undefined, { signal });
        } catch (sleepErr) {
          throw new ModelCancelled(model, sleepErr);
        }
      }
    }
  }
}

/**
 * Create the live model client from configuration.
 * Returns null when no ANTHROPIC_API_KEY is configured.
 */
export function createModelClient(config: CimConfig, logger?: Logger): ModelClient | null {
  const { apiKey } = config.model;
  if (!apiKey) return null;
  return new AnthropicModelClient({ ...config.model, apiKey }, logger);
}
