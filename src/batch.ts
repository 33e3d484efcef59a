// ============================================================================
// OData $batch support
// ============================================================================

import type { WriteMethod } from './entry-encoder.js';
import { ConfigurationError, ODataWriterError } from './errors.js';
import type { ContentIdLookup } from './link-encoder.js';
import type { Logger } from './logger.js';
import { silentLogger } from './logger.js';
import { normalizePath } from './url.js';

type Fetch = (input: Request, init?: RequestInit) => Promise<Response>;

export type ODataBatchWriterOptions = {
  baseUrl: string;
  transport?: Fetch;
  logger?: Logger;
};

/** One request inside a batch changeset. */
export interface BatchOperationMessage {
  readonly method: WriteMethod;
  readonly url: string;
  readonly headers: Headers;
  readonly body: Uint8Array | null;
  setHeader(name: string, value: string): void;
  write(body: Uint8Array): void;
}

/**
 * Sink the request writer queues operations into. Content ids are allocated
 * from a counter and remembered per entry object, so later operations can
 * link to entries created earlier in the same changeset.
 */
export interface BatchWriter extends ContentIdLookup {
  startBatch(): Promise<void>;
  nextContentId(): number;
  mapContentId(entryData: object, contentId: number): void;
  createOperation(method: WriteMethod, url: string): Promise<BatchOperationMessage>;
}

class BatchOperation implements BatchOperationMessage {
  readonly headers = new Headers();
  #body: Uint8Array | null = null;

  constructor(
    readonly method: WriteMethod,
    readonly url: string
  ) {}

  get body(): Uint8Array | null {
    return this.#body;
  }

  setHeader(name: string, value: string): void {
    this.headers.set(name, value);
  }

  write(body: Uint8Array): void {
    if (this.#body) throw new ODataWriterError(`Operation '${this.method} ${this.url}' already has a body`);
    this.#body = body;
  }
}

// ============================================================================
// Batch Writer
// ============================================================================

export class ODataBatchWriter implements BatchWriter {
  #options: ODataBatchWriterOptions;
  #logger: Logger;
  #operations: BatchOperation[] = [];
  #contentIds = new WeakMap<object, number>();
  #lastContentId = 0;
  #started = false;

  constructor(options: ODataBatchWriterOptions) {
    this.#options = options;
    this.#logger = options.logger ?? silentLogger;
  }

  get operations(): readonly BatchOperationMessage[] {
    return this.#operations;
  }

  async startBatch(): Promise<void> {
    if (this.#started) throw new ODataWriterError('Batch has already been started');
    this.#started = true;
    this.#logger.debug('Batch started');
  }

  nextContentId(): number {
    this.#lastContentId += 1;
    return this.#lastContentId;
  }

  mapContentId(entryData: object, contentId: number): void {
    this.#contentIds.set(entryData, contentId);
  }

  getContentId(entryData: object): number | undefined {
    return this.#contentIds.get(entryData);
  }

  async createOperation(method: WriteMethod, url: string): Promise<BatchOperationMessage> {
    if (!this.#started) throw new ODataWriterError('Batch must be started before operations are created');
    const operation = new BatchOperation(method, url);
    this.#operations.push(operation);
    return operation;
  }

  /**
   * Build the HTTP Request representing this $batch. All operations go into
   * one changeset, in the order they were created.
   *
   * This does not execute the request itself.
   */
  buildRequest(): Request {
    const batchBoundary = `batch_${Math.random().toString(36).slice(2)}`;
    const changesetBoundary = `changeset_${Math.random().toString(36).slice(2)}`;
    const decoder = new TextDecoder();
    const lines: string[] = [];

    // Request lines carry the full pathname; services resolve batch URLs from the host root.
    const toRelativePath = (url: string): string => {
      const fullUrl = new URL(url);
      const path = fullUrl.pathname.replace(/\/+$/, '') || '/';
      return path + fullUrl.search;
    };

    lines.push(`--${batchBoundary}`);
    lines.push(`Content-Type: multipart/mixed; boundary=${changesetBoundary}`);
    lines.push('');

    for (const operation of this.#operations) {
      lines.push(`--${changesetBoundary}`);
      lines.push('Content-Type: application/http');
      lines.push('Content-Transfer-Encoding: binary');
      const contentId = operation.headers.get('Content-ID');
      if (contentId != null) {
        lines.push(`Content-ID: ${contentId}`);
      }
      lines.push('');

      lines.push(`${operation.method} ${toRelativePath(operation.url)} HTTP/1.1`);
      operation.headers.forEach((value, key) => {
        if (key === 'content-id') return;
        lines.push(`${key}: ${value}`);
      });
      lines.push('');

      if (operation.body) {
        lines.push(decoder.decode(operation.body));
      }
    }

    lines.push(`--${changesetBoundary}--`);
    lines.push(`--${batchBoundary}--`);

    const body = lines.join('\r\n');

    const url = normalizePath(this.#options.baseUrl, '$batch');
    const headers = new Headers({
      'Content-Type': `multipart/mixed; boundary=${batchBoundary}`,
    });

    return new Request(url, {
      method: 'POST',
      headers,
      body,
    });
  }

  /**
   * Build the batch request and send it via the configured transport.
   */
  async execute(): Promise<Response> {
    const transport = this.#options.transport;
    if (!transport) throw new ConfigurationError('No transport configured for batch execution');
    return transport(this.buildRequest());
  }
}
