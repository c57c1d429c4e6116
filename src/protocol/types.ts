/**
 * Wire protocol types for the microphone client.
 *
 * Wire format:
 * - one JSON object terminated by `\n` (the header)
 * - `data_length` bytes of UTF-8 JSON, merged into `data`  (iff data_length > 0)
 * - `payload_length` raw bytes                               (iff payload_length > 0)
 */

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

/** String-keyed message data, after merging the extra-data block */
export type MessageData = JsonObject;

export const MESSAGE_KINDS = ['audio-chunk', 'client-info', 'ping', 'play-tts'] as const;

export type KnownMessageKind = (typeof MESSAGE_KINDS)[number];

/** Unrecognised wire types decode to 'unknown' rather than failing */
export type MessageKind = KnownMessageKind | 'unknown';

const KNOWN_KINDS: ReadonlySet<string> = new Set(MESSAGE_KINDS);

function isKnownKind(value: string): value is KnownMessageKind {
  return KNOWN_KINDS.has(value);
}

export function toMessageKind(type: JsonValue): MessageKind {
  return typeof type === 'string' && isKnownKind(type) ? type : 'unknown';
}

export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * One decoded protocol unit. Frozen on construction; the decoder keeps no
 * reference to it.
 */
export interface Message {
  readonly kind: MessageKind;
  /** The `type` value exactly as it appeared on the wire */
  readonly type: JsonValue;
  readonly data: Readonly<MessageData>;
  readonly payload: Buffer;
}

function frozenObject(value: JsonObject): JsonObject {
  const copy: JsonObject = {};
  for (const [key, entry] of Object.entries(value)) {
    copy[key] = frozenCopy(entry);
  }
  Object.freeze(copy);
  return copy;
}

function frozenCopy(value: JsonValue): JsonValue {
  if (Array.isArray(value)) {
    const items = value.map(frozenCopy);
    Object.freeze(items);
    return items;
  }
  return isJsonObject(value) ? frozenObject(value) : value;
}

/** Builds a message whose data is a deep, frozen copy of `data` */
export function createMessage(type: JsonValue, data: MessageData = {}, payload: Buffer = Buffer.alloc(0)): Message {
  return Object.freeze({
    kind: toMessageKind(type),
    type: frozenCopy(type),
    data: frozenObject(data),
    payload,
  });
}

/** A control message the host sends to the device */
export interface OutboundMessage {
  type: string;
  data?: JsonObject;
  [key: string]: JsonValue | undefined;
}

export interface PlayTtsMessage extends OutboundMessage {
  type: 'play-tts';
  data: { url: string };
}

export function createPlayTtsMessage(url: string): PlayTtsMessage {
  return { type: 'play-tts', data: { url } };
}

/** One-line summary for logs; the payload is reported by size only */
export function describeMessage(message: Message): string {
  return `Message (${message.kind}): ${JSON.stringify(message.data)} (payload ${message.payload.length} bytes)`;
}
