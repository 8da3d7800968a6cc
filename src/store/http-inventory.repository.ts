import { Logger } from '@nestjs/common';
import { StoreConfig } from '../config/app.config';
import {
  BatchApplyResult,
  ExistingKeySnapshot,
  InventoryMutation,
  InventoryRecord,
  NamedEntity,
  RecordFilter,
  ReferenceSnapshot,
} from '../inventory/inventory.types';
import { InventoryRepository } from './inventory.repository';

const RETRYABLE_STATUS = new Set([429, 503]);

/** Inventory store reached over its REST API. */
export class HttpInventoryRepository extends InventoryRepository {
  private readonly logger = new Logger(HttpInventoryRepository.name);
  private readonly baseUrl: string;

  constructor(private readonly config: StoreConfig) {
    super();
    this.baseUrl = config.baseUrl.replace(/\/+$/, '');
  }

  async getReferenceSnapshot(): Promise<ReferenceSnapshot> {
    const [locations, categories, suppliers] = await Promise.all([
      this.withRetry('locations query', () => this.request<NamedEntity[]>('GET', '/locations')),
      this.withRetry('categories query', () => this.request<NamedEntity[]>('GET', '/categories')),
      this.withRetry('suppliers query', () => this.request<NamedEntity[]>('GET', '/suppliers')),
    ]);

    return { locations, categories, suppliers };
  }

  async getExistingKeys(): Promise<ExistingKeySnapshot> {
    const keys = await this.withRetry('item keys query', () =>
      this.request<Array<{ id: string; sku: string }>>('GET', '/items/keys'),
    );

    return new Map(keys.map((key): [string, string] => [key.sku, key.id]));
  }

  async applyBatch(mutations: InventoryMutation[]): Promise<BatchApplyResult> {
    return this.withRetry(`batch apply (${mutations.length} mutations)`, () =>
      this.request<BatchApplyResult>('POST', '/items/batch', { mutations }),
    );
  }

  async listRecords(filter: RecordFilter): Promise<InventoryRecord[]> {
    const params = new URLSearchParams({ active: 'true' });
    if (filter.locationId) {
      params.set('location_id', filter.locationId);
    }
    if (filter.categoryId) {
      params.set('category_id', filter.categoryId);
    }

    return this.withRetry('items query', () =>
      this.request<InventoryRecord[]>('GET', `/items?${params.toString()}`),
    );
  }

  private async request<T>(method: 'GET' | 'POST', path: string, body?: unknown): Promise<T> {
    const headers: Record<string, string> = { Accept: 'application/json' };
    if (this.config.apiToken) {
      headers.Authorization = `Bearer ${this.config.apiToken}`;
    }
    if (body !== undefined) {
      headers['Content-Type'] = 'application/json';
    }

    const response = await fetch(`${this.baseUrl}${path}`, {
      method,
      headers,
      body: body === undefined ? undefined : JSON.stringify(body),
    });

    if (!response.ok) {
      const message = await response.text();
      throw new HttpLikeError(`Store HTTP ${response.status}: ${message}`, response.status);
    }

    return (await response.json()) as T;
  }

  private async withRetry<T>(label: string, operation: () => Promise<T>): Promise<T> {
    let attempt = 0;

    while (true) {
      attempt += 1;

      try {
        return await operation();
      } catch (error: unknown) {
        const shouldRetry =
          error instanceof HttpLikeError &&
          RETRYABLE_STATUS.has(error.statusCode) &&
          attempt <= this.config.maxRetries;

        if (!shouldRetry) {
          throw error;
        }

        const delayMs = this.config.retryBaseDelayMs * attempt;
        this.logger.warn(
          `Store busy for ${label}. Retry ${attempt}/${this.config.maxRetries} in ${delayMs}ms`,
        );
        await this.delay(delayMs);
      }
    }
  }

  private async delay(ms: number): Promise<void> {
    await new Promise((resolve) => setTimeout(resolve, ms));
  }
}

export class HttpLikeError extends Error {
  constructor(
    message: string,
    readonly statusCode: number,
  ) {
    super(message);
    this.name = 'HttpLikeError';
  }
}
