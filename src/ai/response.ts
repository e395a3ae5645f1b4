/**
 * Strip code fences and chatter around the first JSON object in a model reply.
 */
export function cleanJsonResponse(response: string): string {
  const unfenced = response
    .replace(/```[a-zA-Z]*\s*/g, '')
    .replace(/`+/g, '')
    .trim();

  const start = unfenced.indexOf('{');
  const end = unfenced.lastIndexOf('}');
  if (start !== -1 && end > start) {
    return unfenced.slice(start, end + 1);
  }
  return unfenced;
}

export type DecodeResult =
  | { ok: true; value: Record<string, unknown> }
  | { ok: false; reason: string };

/**
 * Decode a model reply into a provisional mapping. Anything but a JSON object is a failure.
 */
export function decodeModelRecord(response: string): DecodeResult {
  const cleaned = cleanJsonResponse(response);

  let value: unknown;
  try {
    value = JSON.parse(cleaned);
  } catch (error: unknown) {
    const detail = error instanceof Error ? error.message : String(error);
    return { ok: false, reason: `Model returned undecodable JSON: ${detail}` };
  }

  if (!isJsonObject(value)) {
    return { ok: false, reason: 'Model returned JSON that is not an object' };
  }

  return { ok: true, value };
}

function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
