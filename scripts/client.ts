/**
 * Response clients
 *
 * A client turns (prompt, model) into response text. The live client goes
 * through the AI Gateway; the mock client answers with a fixed placeholder
 * so the rest of the pipeline runs without a key.
 */

import { generateText } from 'ai';
import { AuthError, classifyError, reportWarning } from './errors.js';
import { createModelFactory } from './providers/registry.js';

export interface ClientResponse {
  text: string;
  /** Time spent in the successful model call, excluding rate-limit waits and retries */
  durationMs: number;
}

export interface ResponseClient {
  readonly mode: 'live' | 'mock';
  getResponse(prompt: string, modelId: string): Promise<ClientResponse>;
}

export interface TransportRequest {
  prompt: string;
  modelId: string;
  maxOutputTokens: number;
}

export type Transport = (request: TransportRequest) => Promise<string>;

export interface LiveClientOptions {
  /** Minimum time between the start of consecutive calls */
  requestIntervalMs?: number;
  maxRetries?: number;
  /** First retry waits this long; each later retry doubles it */
  retryBackoffMs?: number;
  maxOutputTokens?: number;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

export const DEFAULT_REQUEST_INTERVAL_MS = 500;
export const DEFAULT_MAX_RETRIES = 2;
export const DEFAULT_RETRY_BACKOFF_MS = 1000;
export const DEFAULT_MAX_OUTPUT_TOKENS = 1024;

export async function sleep(ms: number): Promise<void> {
  await new Promise((r) => setTimeout(r, ms));
}

export function mockResponse(prompt: string): string {
  return `[Mock Response] This is a simulated response to demonstrate the evaluation framework. In production, this would be the model's actual response to: '${prompt.slice(0, 50)}...'`;
}

export class MockResponseClient implements ResponseClient {
  readonly mode = 'mock' as const;

  async getResponse(prompt: string): Promise<ClientResponse> {
    return { text: mockResponse(prompt), durationMs: 0 };
  }
}

export function createGatewayTransport(apiKey: string): Transport {
  const getModel = createModelFactory(apiKey);
  return async ({ prompt, modelId, maxOutputTokens }) => {
    const result = await generateText({
      model: getModel(modelId),
      prompt,
      maxOutputTokens,
      // Retries are handled by LiveResponseClient so they can be counted and logged
      maxRetries: 0,
    });
    return result.text;
  };
}

export class LiveResponseClient implements ResponseClient {
  readonly mode = 'live' as const;
  private readonly requestIntervalMs: number;
  private readonly maxRetries: number;
  private readonly retryBackoffMs: number;
  private readonly maxOutputTokens: number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => number;
  private lastCallAt: number | null = null;
  private gate: Promise<void> = Promise.resolve();

  constructor(
    private readonly transport: Transport,
    options: LiveClientOptions = {},
  ) {
    this.requestIntervalMs = options.requestIntervalMs ?? DEFAULT_REQUEST_INTERVAL_MS;
    this.maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES;
    this.retryBackoffMs = options.retryBackoffMs ?? DEFAULT_RETRY_BACKOFF_MS;
    this.maxOutputTokens = options.maxOutputTokens ?? DEFAULT_MAX_OUTPUT_TOKENS;
    this.sleep = options.sleep ?? sleep;
    this.now = options.now ?? Date.now;
  }

  async getResponse(prompt: string, modelId: string): Promise<ClientResponse> {
    for (let attempt = 0; ; attempt++) {
      await this.throttle();
      const start = this.now();
      try {
        const text = await this.transport({ prompt, modelId, maxOutputTokens: this.maxOutputTokens });
        return { text, durationMs: this.now() - start };
      } catch (e) {
        const err = classifyError(e);
        if (err instanceof AuthError || attempt >= this.maxRetries) {
          throw err;
        }
        const backoffMs = this.retryBackoffMs * 2 ** attempt;
        reportWarning(`Attempt ${attempt + 1} failed, retrying in ${backoffMs}ms`, {
          context: 'response-client',
          model: modelId,
          status: err.status,
          reason: err.message,
        });
        await this.sleep(backoffMs);
      }
    }
  }

  // Calls pass through one at a time so the interval holds even when
  // several evaluations share this client.
  private throttle(): Promise<void> {
    const next = this.gate.then(async () => {
      if (this.lastCallAt !== null) {
        const wait = this.requestIntervalMs - (this.now() - this.lastCallAt);
        if (wait > 0) await this.sleep(wait);
      }
      this.lastCallAt = this.now();
    });
    this.gate = next;
    return next;
  }
}

export interface CreateClientOptions extends LiveClientOptions {
  apiKey: string | null;
  transport?: Transport;
}

/** No key means mock mode for the whole run. */
export function createResponseClient(options: CreateClientOptions): ResponseClient {
  const { apiKey, transport, ...live } = options;
  if (!apiKey) {
    return new MockResponseClient();
  }
  return new LiveResponseClient(transport ?? createGatewayTransport(apiKey), live);
}
