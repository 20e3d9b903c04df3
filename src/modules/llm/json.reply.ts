export type JsonRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is JsonRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Models often wrap JSON in prose or code fences. Parses the outermost
 * `{...}` span of the reply, or returns undefined.
 */
export function parseJsonReply(reply: string): JsonRecord | undefined {
  const start = reply.indexOf("{");
  const end = reply.lastIndexOf("}");
  if (start === -1 || end <= start) return undefined;

  try {
    const parsed: unknown = JSON.parse(reply.slice(start, end + 1));
    return isRecord(parsed) ? parsed : undefined;
  } catch {
    return undefined;
  }
}

function clampUnit(value: number): number {
  return Math.max(0, Math.min(1, value));
}

/**
 * Reads a [0,1] score from `field` of a JSON reply. Only a reply with no
 * JSON object at all falls back to the first number in the raw text; a
 * parsed object without a finite `field` throws.
 */
export function readUnitScore(reply: string, field: string): number {
  const parsed = parseJsonReply(reply);
  if (parsed) {
    const value = parsed[field];
    if (typeof value === "number" && Number.isFinite(value)) {
      return clampUnit(value);
    }
    throw new Error(`Model reply has no numeric "${field}"`);
  }

  console.warn(`Failed to parse "${field}" from model reply as JSON:`, reply);

  const match = reply.match(/([0-9]*\.?[0-9]+)/);
  if (match) {
    const score = parseFloat(match[1]);
    if (!isNaN(score)) {
      return clampUnit(score);
    }
  }

  throw new Error(`Could not extract "${field}" from model reply`);
}

export function readNonNegativeInt(record: JsonRecord, field: string): number | undefined {
  const value = record[field];
  if (typeof value !== "number" || !Number.isFinite(value) || value < 0) {
    return undefined;
  }
  return Math.floor(value);
}
