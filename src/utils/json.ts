// This utility module keeps JSON decoding explicit so callers can map failures to protocol errors.

export type JsonDecodeResult = { ok: true; value: unknown } | { ok: false; message: string };

// This helper parses one JSON document and reports malformed input without throwing.
export function decodeJson(value: string): JsonDecodeResult {
  try {
    const parsed: unknown = JSON.parse(value);
    return { ok: true, value: parsed };
  } catch (error) {
    return {
      ok: false,
      message: error instanceof Error ? error.message : 'unknown'
    };
  }
}

// This helper narrows unknown JSON values to plain objects.
export function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
