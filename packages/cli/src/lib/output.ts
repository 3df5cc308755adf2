/**
 * Output Formatting for CLI Commands
 *
 * @module cli/lib/output
 */

export type OutputValue = string | number | bigint | boolean;

/**
 * Format data as JSON; bigints are written as decimal strings
 */
export function formatJson<T>(data: T, pretty = true): string {
  return JSON.stringify(
    data,
    (_key, value: unknown) => (typeof value === 'bigint' ? value.toString(10) : value),
    pretty ? 2 : undefined
  );
}

/**
 * Format a record as aligned `key  value` lines
 */
export function formatKeyValue(data: Readonly<Record<string, OutputValue>>): string {
  const entries = Object.entries(data);
  const width = Math.max(...entries.map(([key]) => key.length));

  return entries
    .map(([key, value]) => `${`${key}:`.padEnd(width + 1)}  ${String(value)}`)
    .join('\n');
}

/**
 * Render for the configured mode: JSON object or key/value block
 */
export function formatRecord(
  data: Readonly<Record<string, OutputValue>>,
  json: boolean
): string {
  return json ? formatJson(data) : formatKeyValue(data);
}
