/**
 * codec.ts - DataPoint ⇄ storage document encoding, search result decoding
 *
 * Encoding (insert path):
 *   DataPoint → embeddable text (sent to the embedding engine)
 *   DataPoint + vector → StorageDocument { id, vector, payload_data }
 *
 * Decoding (search path):
 *   [total, { key: { id, score, payload_data, vector? } }] → ScoredResult[]
 *
 * Decoding never throws. A payload that is not a JSON object is wrapped as
 * { _payload: value }; one that is not JSON at all as { _payload_raw: text }.
 *
 * Query vectors travel as packed little-endian float32 bytes; see
 * toFloat32Buffer().
 */

import { z } from "zod";
import { toText } from "./protocol";
import type {
  DataPoint,
  RetrievedPayload,
  ScoredResult,
  StorageDocument,
} from "./types";

const DEFAULT_INDEX_FIELDS = ["text"];

/** Field names in a search hit. The score may come back unaliased. */
const SCORE_FIELDS = ["score", "__vector_score"];

/**
 * Type guard for plain JSON-like objects (not arrays, Dates, Maps, ...).
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null) return false;
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Converts a payload tree into something JSON.stringify accepts.
 *
 * - bigint ids → decimal strings
 * - Date → ISO-8601 string
 * - arrays → recursed
 * - other objects, class instances included → own enumerable properties,
 *   recursed
 * - everything else → unchanged
 */
export function serializePayload(value: unknown): unknown {
  if (typeof value === "bigint") return value.toString();
  if (value instanceof Date) return value.toISOString();
  if (Array.isArray(value)) return value.map(serializePayload);
  if (typeof value === "object" && value !== null) {
    const result: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) {
      result[key] = serializePayload(item);
    }
    return result;
  }
  return value;
}

/**
 * Extracts the text to embed for a DataPoint.
 *
 * Joins the string values of the fields named in metadata.indexFields
 * (default ["text"]) with newlines. Missing or non-string fields are skipped.
 */
export function getEmbeddableText(point: DataPoint): string {
  const fields = point.metadata?.indexFields ?? DEFAULT_INDEX_FIELDS;
  return fields
    .map((field) => point[field])
    .filter((value): value is string => typeof value === "string" && value !== "")
    .join("\n");
}

/**
 * Builds the StorageDocument for a DataPoint and its embedding.
 *
 * The payload is the whole record with `id` forced to a string, so
 * retrieve() hands back the same id the caller used as a key.
 */
export function toStorageDocument(
  point: DataPoint,
  vector: number[]
): StorageDocument {
  const id = String(point.id);
  const payload = serializePayload({ ...point, id });
  return {
    id,
    vector,
    payload_data: JSON.stringify(payload),
  };
}

/**
 * Packs a vector as little-endian float32 bytes (the KNN query parameter).
 */
export function toFloat32Buffer(vector: number[]): Buffer {
  const buffer = Buffer.alloc(vector.length * 4);
  vector.forEach((value, i) => buffer.writeFloatLE(value, i * 4));
  return buffer;
}

/**
 * Inverse of toFloat32Buffer(). Trailing bytes that do not make a full
 * float are ignored.
 */
export function fromFloat32Buffer(buffer: Buffer): number[] {
  const values: number[] = [];
  for (let offset = 0; offset + 4 <= buffer.length; offset += 4) {
    values.push(buffer.readFloatLE(offset));
  }
  return values;
}

/**
 * Parses a stored payload_data string.
 */
export function decodePayload(text: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return { _payload_raw: text };
  }
  return isRecord(parsed) ? parsed : { _payload: parsed };
}

const StoredDocumentSchema = z.object({ payload_data: z.string() }).passthrough();

/**
 * JSON.GET with the "$" path wraps the document in an array of matches;
 * without a path it is the document itself.
 */
const StoredDocumentReplySchema = z.union([
  z.array(StoredDocumentSchema).nonempty().transform((matches) => matches[0]),
  StoredDocumentSchema,
]);

/**
 * Decodes a JSON.GET reply into the stored payload.
 *
 * Falls back to the raw document text when the document or its
 * payload_data is not valid JSON, or payload_data is missing.
 */
export function decodeStoredDocument(raw: string): RetrievedPayload {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return raw;
  }

  const document = StoredDocumentReplySchema.safeParse(parsed);
  if (!document.success) return raw;

  let payload: unknown;
  try {
    payload = JSON.parse(document.data.payload_data);
  } catch {
    return raw;
  }
  return isRecord(payload) ? payload : { _payload: payload };
}

/**
 * Decodes a search response into scored results.
 *
 * Accepts [total, documents] where documents is a plain object or a Map
 * (keys and values may still be byte strings). Anything else decodes to [].
 */
export function decodeScoredResults(response: unknown): ScoredResult[] {
  if (!Array.isArray(response) || response.length !== 2) return [];
  const documents = entriesOf(response[1]);
  if (!documents) return [];

  const results: ScoredResult[] = [];
  for (const [rawKey, rawFields] of documents) {
    const key = String(toText(rawKey));
    const fields = new Map<string, unknown>();
    for (const [name, value] of entriesOf(rawFields) ?? []) {
      fields.set(String(toText(name)), toText(value));
    }

    const rawId = fields.get("id");
    const result: ScoredResult = {
      id: rawId === undefined || rawId === null ? key : String(rawId),
      payload: {},
      score: parseScore(fields),
    };

    const payloadText = fields.get("payload_data");
    if (typeof payloadText === "string") {
      result.payload = decodePayload(payloadText);
    }

    const vector = parseVector(fields.get("vector"));
    if (vector) result.vector = vector;

    results.push(result);
  }

  return results;
}

/**
 * Orders results most similar first (ascending distance), nulls last.
 * Stable for equal scores.
 */
export function sortByScore(results: ScoredResult[]): ScoredResult[] {
  return [...results].sort((a, b) => {
    if (a.score === null) return b.score === null ? 0 : 1;
    if (b.score === null) return -1;
    return a.score - b.score;
  });
}

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

function entriesOf(value: unknown): Array<[unknown, unknown]> | null {
  if (value instanceof Map) return [...value.entries()];
  if (isRecord(value)) return Object.entries(value);
  return null;
}

function parseScore(fields: Map<string, unknown>): number | null {
  for (const name of SCORE_FIELDS) {
    const value = fields.get(name);
    if (value === undefined || value === null) continue;
    const score = typeof value === "number" ? value : parseFloat(String(value));
    return Number.isFinite(score) ? score : null;
  }
  return null;
}

/**
 * The returned vector is JSON text, either the array itself or wrapped in
 * a one-element array of JSONPath matches.
 */
function parseVector(value: unknown): number[] | undefined {
  if (typeof value !== "string") return undefined;
  let parsed: unknown;
  try {
    parsed = JSON.parse(value);
  } catch {
    return undefined;
  }
  if (Array.isArray(parsed) && parsed.length === 1 && Array.isArray(parsed[0])) {
    parsed = parsed[0];
  }
  if (Array.isArray(parsed) && parsed.every((n): n is number => typeof n === "number")) {
    return parsed;
  }
  return undefined;
}
