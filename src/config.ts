import { ConfigurationError } from './errors.js';
import type { Logger } from './logger.js';
import { silentLogger } from './logger.js';
import type { PayloadFormat } from './payload.js';

/**
 * Writer configuration.
 */
export interface WriterConfig {
  /**
   * Service root that batch operation URLs and entity references are
   * resolved against, e.g. `https://example.com/odata/`.
   */
  urlBase: string;

  /**
   * Payload format. Defaults to `json`.
   */
  payloadFormat?: PayloadFormat;

  /**
   * Pretty-print payloads. Defaults to false.
   */
  indent?: boolean;

  logger?: Logger;
}

export type ResolvedWriterConfig = Required<WriterConfig>;

/**
 * Helper for typed configuration objects.
 */
export function defineConfig(config: WriterConfig): WriterConfig {
  return config;
}

const PAYLOAD_FORMATS: readonly string[] = ['json', 'atom'] satisfies PayloadFormat[];

export function resolveWriterConfig(config: WriterConfig): ResolvedWriterConfig {
  try {
    new URL(config.urlBase);
  } catch (error) {
    throw new ConfigurationError(
      `urlBase must be an absolute URL, got '${config.urlBase}': ${error instanceof Error ? error.message : String(error)}`
    );
  }
  const payloadFormat = config.payloadFormat ?? 'json';
  if (!PAYLOAD_FORMATS.includes(payloadFormat)) {
    throw new ConfigurationError(`Unsupported payload format '${String(payloadFormat)}'`);
  }
  return {
    urlBase: config.urlBase,
    payloadFormat,
    indent: config.indent ?? false,
    logger: config.logger ?? silentLogger,
  };
}
