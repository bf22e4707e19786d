/**
 * Script Splitter
 *
 * Splits a multi-statement definition (view, routine or trigger body) into
 * batches on separator lines. A line is a separator only when its trimmed
 * text equals the separator keyword, case-insensitively. Splitting is purely
 * textual: string literals, block comments and repeat counts (`GO 10`) are
 * not recognised.
 */

export const DEFAULT_BATCH_SEPARATOR = 'GO';

export function splitBatches(script: string, separator: string = DEFAULT_BATCH_SEPARATOR): string[] {
  const lines = script.replace(/\r\n/g, '\n').replace(/\r/g, '\n').split('\n');
  const keyword = separator.trim().toUpperCase();

  const batches: string[] = [];
  let current: string[] = [];

  const flush = (): void => {
    const text = current.join('\n').trim();
    current = [];
    if (text.length > 0) {
      batches.push(text);
    }
  };

  for (const line of lines) {
    if (line.trim().toUpperCase() === keyword) {
      flush();
      continue;
    }
    current.push(line);
  }
  flush();

  return batches;
}
