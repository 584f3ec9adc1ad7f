export const DEFAULT_DELIMITER = ',';

// These collide with CSV record framing and quoting.
const RESERVED_DELIMITERS = ['\r', '\n', '"'];

/**
 * Validate a delimiter given on the command line or in config.
 *
 * Accepts exactly one ASCII character. `undefined` falls back to the default comma.
 */
export function parseDelimiter(value: string | undefined): string {
  if (value === undefined) {
    return DEFAULT_DELIMITER;
  }
  if (value.length === 0) {
    throw new Error('Delimiter must be a single ASCII character, got an empty string');
  }
  if (value.length !== 1 || value.charCodeAt(0) > 0x7f) {
    throw new Error(`Delimiter must be a single ASCII character, got '${value}'`);
  }
  if (RESERVED_DELIMITERS.includes(value)) {
    throw new Error(`Delimiter ${JSON.stringify(value)} is reserved by the CSV format`);
  }
  return value;
}
