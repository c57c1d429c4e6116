/**
 * Message codec for the microphone client protocol.
 *
 * decodeMessage() pulls exactly one message off a StreamReader: a JSON
 * header line followed by the optional extra-data and payload blocks the
 * header announces. encodeMessage() produces one outbound JSON line.
 */

import { z } from 'zod';

import { BadMessageError, ReadTimeoutError } from '../utils/errors.js';
import { NEWLINE, type StreamReader } from './stream-reader.js';
import {
  createMessage,
  type JsonObject,
  type JsonValue,
  type Message,
  type OutboundMessage,
} from './types.js';

/** How long each announced extension block may take to arrive */
export const EXTENSION_TIMEOUT_MS = 500;

const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(jsonValueSchema), z.record(jsonValueSchema)])
);

const jsonObjectSchema = z.record(jsonValueSchema);

const headerSchema = z
  .object({
    type: jsonValueSchema,
    data: jsonObjectSchema.nullish(),
    data_length: z.number().int().nullish(),
    payload_length: z.number().int().nullish(),
  })
  .passthrough();

export interface DecodeOptions {
  extensionTimeoutMs?: number;
  signal?: AbortSignal;
}

const utf8 = new TextDecoder('utf-8', { fatal: true });

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

function parseJson(bytes: Buffer, what: string): unknown {
  let text: string;
  try {
    text = utf8.decode(bytes);
  } catch (err) {
    throw new BadMessageError(`Couldn't decode ${what} as UTF-8`, bytes, { cause: err });
  }

  try {
    return JSON.parse(text);
  } catch (err) {
    throw new BadMessageError(`Failed to decode JSON for ${what}: '${text.trim()}'`, bytes, { cause: err });
  }
}

async function readExtension(
  reader: StreamReader,
  length: number,
  what: string,
  options: DecodeOptions
): Promise<Buffer> {
  const timeoutMs = options.extensionTimeoutMs ?? EXTENSION_TIMEOUT_MS;
  try {
    return await reader.readExactly(length, timeoutMs, options.signal);
  } catch (err) {
    if (err instanceof ReadTimeoutError) {
      throw new BadMessageError(`Timed out waiting for ${what}`, Buffer.alloc(0), { cause: err });
    }
    throw err;
  }
}

/**
 * Decode the next message from the stream.
 *
 * Returns null once the stream has closed. Blank lines are skipped.
 * Malformed input throws BadMessageError; transport failures and aborts
 * propagate unchanged.
 */
export async function decodeMessage(reader: StreamReader, options: DecodeOptions = {}): Promise<Message | null> {
  let line = await reader.readLine(options.signal);
  while (line.length === 1 && line[0] === NEWLINE) {
    line = await reader.readLine(options.signal);
  }

  if (line.length === 0) {
    return null;
  }

  const parsed = headerSchema.safeParse(parseJson(line, 'message header'));
  if (!parsed.success) {
    throw new BadMessageError(`Invalid message header: ${formatIssues(parsed.error)}`, line);
  }

  const header = parsed.data;
  let data: JsonObject = header.data ?? {};

  if (header.data_length != null && header.data_length > 0) {
    const extra = await readExtension(reader, header.data_length, 'extra data', options);
    const merged = jsonObjectSchema.safeParse(parseJson(extra, 'extra data'));
    if (!merged.success) {
      throw new BadMessageError('Extra data is not a JSON object', extra);
    }
    data = { ...data, ...merged.data };
  }

  let payload: Buffer = Buffer.alloc(0);
  if (header.payload_length != null && header.payload_length > 0) {
    // Copy so the message does not pin the reader's receive buffer
    payload = Buffer.from(await readExtension(reader, header.payload_length, 'payload', options));
  }

  return createMessage(header.type, data, payload);
}

/** Serialize an outbound message as a single JSON line. */
export function encodeMessage(message: OutboundMessage): Buffer {
  return Buffer.from(`${JSON.stringify(message)}\n`, 'utf-8');
}
