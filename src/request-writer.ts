// ============================================================================
// Request Writer
// ============================================================================

import type { BatchWriter } from './batch.js';
import type { SchemaCatalog } from './catalog.js';
import type { ResolvedWriterConfig, WriterConfig } from './config.js';
import { resolveWriterConfig } from './config.js';
import type { EntryData } from './entry.js';
import type { WriteMethod } from './entry-encoder.js';
import { encodeEntry } from './entry-encoder.js';
import { CONTENT_TYPES, serializeEntry, serializeReference } from './payload.js';
import { normalizePath } from './url.js';

const CONCURRENCY_CHECKED_METHODS: ReadonlySet<WriteMethod> = new Set(['PUT', 'PATCH', 'MERGE', 'DELETE']);

/** One start per batch, shared by every writer queueing into it. */
const batchStarts = new WeakMap<BatchWriter, Promise<void>>();

function ensureBatchStarted(batch: BatchWriter): Promise<void> {
  let started = batchStarts.get(batch);
  if (!started) {
    started = batch.startBatch();
    batchStarts.set(batch, started);
  }
  return started;
}

/**
 * Turns entry data into request bodies for a single service. Without a batch
 * writer each call returns its payload; with one, payloads are queued as
 * changeset operations and the calls resolve to null.
 */
export class RequestWriter {
  #catalog: SchemaCatalog;
  #config: ResolvedWriterConfig;
  #batch?: BatchWriter;

  constructor(catalog: SchemaCatalog, config: WriterConfig, batch?: BatchWriter) {
    this.#catalog = catalog;
    this.#config = resolveWriterConfig(config);
    this.#batch = batch;
  }

  /**
   * Encode `entryData` for `method` against the entity set named by
   * `collection`. `commandText` is the request path relative to the service
   * root, e.g. `Orders(3)`.
   *
   * In batch mode the entry is encoded first. The operation is created and
   * its content id allocated only after a successful encode, so a failed
   * encode queues nothing and an entry linking to its own data object is
   * referenced by key.
   */
  async writeEntry(
    method: WriteMethod,
    collection: string,
    entryData: EntryData,
    commandText: string
  ): Promise<Uint8Array | null> {
    const typeName = this.#catalog.getEntitySetTypeName(collection);
    const batch = this.#batch;
    if (batch) await ensureBatchStarted(batch);

    const entry = encodeEntry(
      {
        model: this.#catalog.model,
        catalog: this.#catalog,
        contentIds: batch,
        logger: this.#config.logger,
      },
      typeName,
      entryData,
      method
    );
    const body = entry && serializeEntry(entry, { format: this.#config.payloadFormat, indent: this.#config.indent });

    if (!batch) return body;

    const url = normalizePath(this.#config.urlBase, commandText);
    const operation = await batch.createOperation(method, url);
    if (method !== 'DELETE') {
      const contentId = batch.nextContentId();
      batch.mapContentId(entryData, contentId);
      operation.setHeader('Content-ID', String(contentId));
    }
    if (CONCURRENCY_CHECKED_METHODS.has(method) && this.#catalog.requiresOptimisticConcurrencyCheck(collection)) {
      operation.setHeader('If-Match', '*');
    }
    if (body) {
      operation.setHeader('Content-Type', CONTENT_TYPES[this.#config.payloadFormat]);
      operation.write(body);
    }
    this.#config.logger.debug(`Queued ${method} ${url} in batch`);
    return null;
  }

  /**
   * Entity reference payload for `relativePath`, resolved against the
   * service root.
   */
  async writeLink(relativePath: string): Promise<Uint8Array> {
    const url = normalizePath(this.#config.urlBase, relativePath);
    return serializeReference(url, { format: this.#config.payloadFormat, indent: this.#config.indent });
  }
}
