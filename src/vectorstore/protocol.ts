/**
 * protocol.ts - Turns raw Valkey replies into text-keyed structures
 *
 * The transport hands back replies exactly as the server sent them: bulk
 * strings arrive as Buffers, integers as numbers, arrays as nested arrays.
 * This file is the single place where bytes become text. Nothing past it
 * (codec.ts, schema.ts, the backend) ever sees a Buffer.
 *
 * Replies handled here:
 * - FT.SEARCH: [total, key, [field, value, ...], key, [...], ...]
 * - FT.INFO:   [name, value, name, value, ...]
 * - FT._LIST:  [index, index, ...]
 * - simple acknowledgements ("OK", "PONG") and integer replies (DEL)
 */

import { z } from "zod";
import { ProtocolError } from "./errors";

/** A reply with every byte string decoded to text. */
export type NormalizedReply = string | number | null | NormalizedReply[];

/** Field name → value for one search hit. */
export type FieldMap = Record<string, string>;

/**
 * The decoded FT.SEARCH reply: total hit count, then key → fields.
 * Keys keep the order the server returned them in.
 */
export type SearchResponse = [total: number, documents: Record<string, FieldMap>];

/**
 * Decodes a byte string to UTF-8 text. Other values pass through unchanged.
 */
export function toText(value: unknown): unknown {
  if (value instanceof Uint8Array) {
    return Buffer.from(value.buffer, value.byteOffset, value.byteLength).toString("utf-8");
  }
  return value;
}

/**
 * Recursively decodes every byte string in a reply.
 *
 * Anything that is not a string, number, byte string or array becomes null;
 * replies from the transport never contain other shapes.
 */
export function normalizeReply(value: unknown): NormalizedReply {
  const decoded = toText(value);
  if (typeof decoded === "string" || typeof decoded === "number") return decoded;
  if (typeof decoded === "bigint") return Number(decoded);
  if (Array.isArray(decoded)) return decoded.map(normalizeReply);
  return null;
}

/**
 * True for a simple-string "OK" acknowledgement (byte or text).
 */
export function isOkReply(reply: unknown): boolean {
  return normalizeReply(reply) === "OK";
}

/**
 * Converts a flat FT.SEARCH reply into [total, { key: { field: value } }].
 *
 * Field values are always text. Entries whose field list is missing or
 * malformed keep the key with an empty field map, so a hit is never dropped.
 *
 * @throws ProtocolError when the reply is not an array starting with a count
 */
export function toSearchResponse(reply: unknown): SearchResponse {
  const normalized = normalizeReply(reply);
  if (!Array.isArray(normalized) || normalized.length === 0) {
    throw new ProtocolError("FT.SEARCH", "FT.SEARCH reply is not an array");
  }

  const [total, ...rest] = normalized;
  const count = typeof total === "number" ? total : Number(total);
  if (!Number.isFinite(count)) {
    throw new ProtocolError("FT.SEARCH", "FT.SEARCH reply does not start with a count");
  }

  const documents: Record<string, FieldMap> = {};
  for (let i = 0; i < rest.length; i += 2) {
    const key = rest[i];
    if (key === null || Array.isArray(key)) continue;
    documents[String(key)] = toFieldMap(rest[i + 1]);
  }

  return [count, documents];
}

/**
 * Pairs up a flat [name, value, name, value, ...] list.
 * Nested values are JSON-encoded so the map stays string-valued.
 */
function toFieldMap(value: NormalizedReply | undefined): FieldMap {
  const fields: FieldMap = {};
  if (!Array.isArray(value)) return fields;

  for (let i = 0; i + 1 < value.length; i += 2) {
    const name = value[i];
    const fieldValue = value[i + 1];
    if (name === null || Array.isArray(name)) continue;
    fields[String(name)] =
      typeof fieldValue === "string" ? fieldValue : JSON.stringify(fieldValue);
  }
  return fields;
}

// ---------------------------------------------------------------------------
// FT.INFO
// ---------------------------------------------------------------------------

/**
 * The parts of FT.INFO the engine uses.
 */
export interface IndexInfo {
  name: string;
  numDocs: number;
}

const IndexInfoSchema = z.object({
  index_name: z.string(),
  num_docs: z.union([z.number(), z.string()]).pipe(z.coerce.number().int().nonnegative()),
});

/**
 * Parses an FT.INFO reply ([name, value, ...]) into IndexInfo.
 *
 * @throws ProtocolError when index_name or num_docs is missing or malformed
 */
export function parseIndexInfo(reply: unknown): IndexInfo {
  const normalized = normalizeReply(reply);
  if (!Array.isArray(normalized)) {
    throw new ProtocolError("FT.INFO", "FT.INFO reply is not an array");
  }

  const entries: Record<string, NormalizedReply> = {};
  for (let i = 0; i + 1 < normalized.length; i += 2) {
    const name = normalized[i];
    if (typeof name === "string") entries[name] = normalized[i + 1];
  }

  const parsed = IndexInfoSchema.safeParse(entries);
  if (!parsed.success) {
    throw new ProtocolError(
      "FT.INFO",
      `Unexpected FT.INFO reply: ${parsed.error.issues.map((i) => i.message).join("; ")}`
    );
  }
  return { name: parsed.data.index_name, numDocs: parsed.data.num_docs };
}

/**
 * Parses FT._LIST into index names.
 */
export function parseIndexList(reply: unknown): string[] {
  const normalized = normalizeReply(reply);
  if (!Array.isArray(normalized)) {
    throw new ProtocolError("FT._LIST", "FT._LIST reply is not an array");
  }
  return normalized.filter((name): name is string => typeof name === "string");
}

/**
 * Parses an integer reply (DEL). Byte and text digits are accepted.
 */
export function parseIntegerReply(command: string, reply: unknown): number {
  const normalized = normalizeReply(reply);
  const value =
    typeof normalized === "number"
      ? normalized
      : typeof normalized === "string" && normalized.trim() !== ""
        ? Number(normalized)
        : NaN;
  if (!Number.isInteger(value)) {
    throw new ProtocolError(command, `${command} did not return an integer`);
  }
  return value;
}

/**
 * Parses a SCAN reply ([cursor, [key, ...]]). Cursor "0" ends the scan.
 */
export function parseScanReply(reply: unknown): { cursor: string; keys: string[] } {
  const normalized = normalizeReply(reply);
  if (!Array.isArray(normalized) || normalized.length !== 2) {
    throw new ProtocolError("SCAN", "SCAN reply is not a [cursor, keys] pair");
  }
  const [cursor, keys] = normalized;
  if (cursor === null || Array.isArray(cursor) || !Array.isArray(keys)) {
    throw new ProtocolError("SCAN", "SCAN reply is not a [cursor, keys] pair");
  }
  return {
    cursor: String(cursor),
    keys: keys.filter((key): key is string => typeof key === "string"),
  };
}
