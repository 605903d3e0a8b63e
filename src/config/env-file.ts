import { ConfigurationRecord } from '../types/index.js';

const EXPORT_PREFIX = /^export\s+/;

/**
 * Parse a line-oriented `KEY=VALUE` file.
 *
 * Blank lines and `#` comments are skipped, the value is everything after the
 * first `=` (so values may themselves contain `=`) with surrounding whitespace
 * removed, and a value wrapped in matching quotes is unquoted. Later
 * duplicates win.
 */
export function parseEnvFile(content: string): ConfigurationRecord {
  const record: Record<string, string> = {};

  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (line === '' || line.startsWith('#')) {
      continue;
    }

    const separator = line.indexOf('=');
    if (separator === -1) {
      continue;
    }

    const key = line.slice(0, separator).replace(EXPORT_PREFIX, '').trim();
    if (key === '') {
      continue;
    }

    record[key] = unquote(line.slice(separator + 1).trimStart());
  }

  return Object.freeze(record);
}

function unquote(value: string): string {
  if (value.length >= 2) {
    const first = value[0];
    const last = value[value.length - 1];
    if ((first === '"' || first === "'") && first === last) {
      return value.slice(1, -1);
    }
  }
  return value;
}

/**
 * Render a record back into env-file text, one `KEY=VALUE` per line.
 */
export function formatEnvFile(record: ConfigurationRecord, header: string[] = []): string {
  const lines = header.map(line => `# ${line}`);
  for (const [key, value] of Object.entries(record)) {
    lines.push(`${key}=${value}`);
  }
  return `${lines.join('\n')}\n`;
}
