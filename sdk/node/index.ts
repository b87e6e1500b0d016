import type { AnonymizationResult, DeanonymizationResult, EntityRange } from '../../src/engine';
import type { OperatorConfigMap } from '../../src/operators';
import type { Span } from '../../src/spans';

type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface AnonymizerClientOptions {
  baseUrl: string;
  headers?: Record<string, string>;
  fetch?: FetchLike;
}

export class AnonymizerRequestError extends Error {
  constructor(
    readonly status: number,
    readonly body: string,
  ) {
    super(`Request failed (${status}): ${body}`);
    this.name = 'AnonymizerRequestError';
  }
}

export class AnonymizerClient {
  private readonly fetchImpl: FetchLike;

  constructor(private readonly options: AnonymizerClientOptions) {
    this.fetchImpl = options.fetch ?? fetch;
  }

  async anonymize(text: string, spans: Span[], operators?: OperatorConfigMap): Promise<AnonymizationResult> {
    return this.request<AnonymizationResult>('POST', '/anonymize', { text, spans, operators });
  }

  async deanonymize(
    text: string,
    entities: EntityRange[],
    operators?: OperatorConfigMap,
  ): Promise<DeanonymizationResult> {
    return this.request<DeanonymizationResult>('POST', '/deanonymize', { text, entities, operators });
  }

  async listAnonymizers(): Promise<string[]> {
    return this.request<string[]>('GET', '/anonymizers');
  }

  async listDeanonymizers(): Promise<string[]> {
    return this.request<string[]>('GET', '/deanonymizers');
  }

  private async request<T>(method: 'GET' | 'POST', path: string, body?: unknown): Promise<T> {
    const url = `${this.options.baseUrl.replace(/\/+$/, '')}${path}`;
    const response = await this.fetchImpl(url, {
      method,
      headers: {
        'content-type': 'application/json',
        ...(this.options.headers ?? {}),
      },
      body: body === undefined ? undefined : JSON.stringify(body),
    });
    if (!response.ok) {
      const text = await response.text();
      throw new AnonymizerRequestError(response.status, text);
    }
    return (await response.json()) as T;
  }
}
