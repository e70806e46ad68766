/**
 * JSON rendering of described resources
 */

function compareKeys(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * JSON.stringify replacer that sorts object keys.
 * Dates have already gone through toJSON (ISO-8601) by the time the replacer sees them.
 */
function sortedKeys(_key: string, value: unknown): unknown {
  if (value && typeof value === 'object' && !Array.isArray(value)) {
    return Object.fromEntries(
      Object.entries(value).sort(([a], [b]) => compareKeys(a, b))
    );
  }
  return value;
}

/**
 * Render a value as key-sorted, two-space indented JSON
 */
export function formatJson(value: unknown): string {
  return JSON.stringify(value, sortedKeys, 2);
}
