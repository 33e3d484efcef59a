import { MetadataCatalog } from './catalog.js';
import type { WriteMethod } from './entry-encoder.js';
import { isEntryData } from './entry.js';
import { ConfigurationError } from './errors.js';
import { parseMetadata } from './metadata.js';
import type { PayloadFormat } from './payload.js';
import { RequestWriter } from './request-writer.js';

export const USAGE =
  'Usage: odata-write <metadata.xml> <METHOD> <collection> <entry.json> [--base <url>] [--format json|atom] [--indent]';

const WRITE_METHODS: readonly WriteMethod[] = ['POST', 'PUT', 'PATCH', 'MERGE', 'DELETE'];

type CliOptions = {
  metadataPath: string;
  method: WriteMethod;
  collection: string;
  entryPath: string;
  base: string;
  format: PayloadFormat;
  indent: boolean;
};

function isWriteMethod(value: string): value is WriteMethod {
  return WRITE_METHODS.some((method) => method === value);
}

function parseArgs(args: readonly string[]): CliOptions {
  const positional: string[] = [];
  let base = 'http://localhost/';
  let format: PayloadFormat = 'json';
  let indent = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '--base' || arg === '--format') {
      const value = args[++i];
      if (value === undefined) throw new ConfigurationError(`Missing value for ${arg}\n${USAGE}`);
      if (arg === '--base') {
        base = value;
      } else if (value === 'json' || value === 'atom') {
        format = value;
      } else {
        throw new ConfigurationError(`Unsupported payload format '${value}'`);
      }
    } else if (arg === '--indent') {
      indent = true;
    } else if (arg !== undefined) {
      positional.push(arg);
    }
  }

  const [metadataPath, methodArg, collection, entryPath] = positional;
  if (!metadataPath || !methodArg || !collection || !entryPath || positional.length > 4) {
    throw new ConfigurationError(USAGE);
  }
  const method = methodArg.toUpperCase();
  if (!isWriteMethod(method)) {
    throw new ConfigurationError(`Unsupported method '${methodArg}', expected one of ${WRITE_METHODS.join(', ')}`);
  }
  return { metadataPath, method, collection, entryPath, base, format, indent };
}

/**
 * Encode the entry in `entry.json` against `metadata.xml` and return the
 * payload text, or an empty string for DELETE.
 */
export async function run(
  args: readonly string[],
  readFile: (path: string) => Promise<string>
): Promise<string> {
  const options = parseArgs(args);
  const model = parseMetadata(await readFile(options.metadataPath));

  const entryData: unknown = JSON.parse(await readFile(options.entryPath));
  if (!isEntryData(entryData)) {
    throw new ConfigurationError(`${options.entryPath} must contain a JSON object`);
  }

  const writer = new RequestWriter(new MetadataCatalog(model), {
    urlBase: options.base,
    payloadFormat: options.format,
    indent: options.indent,
  });
  const body = await writer.writeEntry(options.method, options.collection, entryData, options.collection);
  return body ? new TextDecoder().decode(body) : '';
}
