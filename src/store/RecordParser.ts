/**
 * RecordParser — Convert between JSON text and plain record objects.
 *
 * It has NO schema-specific logic. It checks that the text is a JSON object
 * but does NOT validate fields; that is the SchemaRegistry's job.
 */

/**
 * Result of parsing a record file.
 */
export interface ParseResult {
  success: boolean;
  /** The parsed object (if successful) */
  data?: Record<string, unknown>;
  /** Error message (if failed) */
  error?: string;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse JSON content into a record object.
 */
export function parseRecord(content: string): ParseResult {
  if (content.trim().length === 0) {
    return { success: false, error: 'Empty record content' };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (err) {
    return {
      success: false,
      error: `Invalid JSON: ${err instanceof Error ? err.message : String(err)}`,
    };
  }

  if (!isPlainObject(parsed)) {
    return {
      success: false,
      error: `Expected object, got ${Array.isArray(parsed) ? 'array' : typeof parsed}`,
    };
  }

  return { success: true, data: parsed };
}

/**
 * Serialize a record to JSON text: 2-space indentation, trailing newline.
 */
export function serializeRecord(record: object): string {
  return `${JSON.stringify(record, null, 2)}\n`;
}
