import { stringify } from 'yaml';
import { isObjectRecord } from './args';
import type { OutputFormat, OutputSettings } from './options';

export interface CLIResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: {
    code: string;
    message: string;
    details?: unknown;
  };
  metadata?: {
    timestamp: string;
    durationMs?: number;
  };
}

export function success<T>(data: T, durationMs?: number): CLIResponse<T> {
  return {
    success: true,
    data,
    metadata: {
      timestamp: new Date().toISOString(),
      ...(durationMs !== undefined ? { durationMs } : {}),
    },
  };
}

export function failure(code: string, message: string, details?: unknown): CLIResponse {
  return {
    success: false,
    error: { code, message, ...(details !== undefined ? { details } : {}) },
    metadata: { timestamp: new Date().toISOString() },
  };
}

export function print(response: CLIResponse, settings: OutputSettings): void {
  if (response.success && settings.quiet) {
    printByFormat(pickQuietData(response.data), settings.output);
    return;
  }

  if (settings.output === 'text') {
    if (response.success) {
      const text = formatText(response.data);
      if (text.length > 0) console.log(text);
      return;
    }
    const code = response.error?.code ?? 'UNKNOWN';
    const message = response.error?.message ?? 'Unknown error';
    console.error(`Error [${code}]: ${message}`);
    const detailsText = formatErrorDetails(response.error?.details);
    if (detailsText) {
      console.error(detailsText);
    }
    return;
  }

  if (settings.output === 'yaml') {
    console.log(toYamlString(response));
    return;
  }

  console.log(JSON.stringify(response, null, 2));
}

function printByFormat(data: unknown, output: OutputFormat): void {
  if (data === undefined) return;
  if (output === 'json') {
    console.log(JSON.stringify(data, null, 2));
    return;
  }
  if (output === 'yaml') {
    console.log(toYamlString(data));
    return;
  }
  if (typeof data === 'string' || typeof data === 'number' || typeof data === 'boolean') {
    console.log(String(data));
    return;
  }
  if (data === null) {
    console.log('null');
    return;
  }
  const text = formatText(data);
  if (text.length > 0) {
    console.log(text);
  }
}

/**
 * Reduce success payloads to their identifying fields for `--quiet`.
 */
export function pickQuietData(data: unknown): unknown {
  if (!isObjectRecord(data)) return data;

  if (typeof data.key === 'string') {
    return {
      key: data.key,
      ...(typeof data.env === 'string' ? { env: data.env } : {}),
    };
  }
  if (typeof data.path === 'string') return { path: data.path };
  if (typeof data.succeeded === 'number') {
    return {
      succeeded: data.succeeded,
      ...(typeof data.failed === 'number' ? { failed: data.failed } : {}),
    };
  }
  if (typeof data.total === 'number') return { total: data.total };

  return data;
}

export function toYamlString(value: unknown): string {
  return stringify(value, { indent: 2 }).trimEnd();
}

function formatTable(rows: Record<string, unknown>[], indent = ''): string {
  if (rows.length === 0) return `${indent}(empty)`;
  const keys = Object.keys(rows[0]);

  const columnLimitFor = (key: string): number => {
    const lower = key.toLowerCase();
    const numericColumn = rows.every((row) =>
      row[key] === null || row[key] === undefined || typeof row[key] === 'number'
    );
    if (numericColumn) return 7;
    if (lower === 'key' || lower === 'env') return 32;
    if (lower.includes('description') || lower.includes('message')) return 40;
    if (lower.endsWith('at')) return 24;
    return 20;
  };

  const truncate = (str: string, maxWidth: number): string => {
    if (str.length <= maxWidth) return str;
    return str.slice(0, maxWidth - 3) + '...';
  };

  // Helper to convert cell values to strings, handling objects/arrays
  const cellToString = (val: unknown, key: string): string => {
    if (val === null || val === undefined) return '';
    if (Array.isArray(val)) return `<array[${val.length}]>`;
    if (typeof val === 'object') return '<object>';

    return truncate(String(val), columnLimitFor(key));
  };

  const widths = keys.map((k) =>
    Math.max(
      Math.min(k.length, columnLimitFor(k)),
      ...rows.map((r) => cellToString(r[k], k).length)
    )
  );
  const header = keys
    .map((k, i) => truncate(k.toUpperCase(), widths[i]).padEnd(widths[i]))
    .join('  ');
  const sep = widths.map((w) => '-'.repeat(w)).join('  ');
  const body = rows.map((r) =>
    keys.map((k, i) => cellToString(r[k], k).padEnd(widths[i])).join('  ').trimEnd()
  );
  return [indent + header.trimEnd(), indent + sep, ...body.map((b) => indent + b)].join('\n');
}

export function formatText(data: unknown, indent = ''): string {
  if (data === undefined || data === null) return '';
  if (typeof data !== 'object') return String(data);
  if (Array.isArray(data)) {
    if (data.length === 0) return `${indent}(empty)`;
    if (data.every(isObjectRecord)) {
      return formatTable(data, indent);
    }
    return data.map((v) => `${indent}- ${String(v)}`).join('\n');
  }
  return Object.entries(data)
    .map(([k, v]) => {
      if (v === null || v === undefined || typeof v !== 'object') return `${indent}${k}: ${String(v)}`;
      if (Array.isArray(v)) {
        if (v.length === 0) return `${indent}${k}: (empty)`;
        if (v.every(isObjectRecord)) {
          return `${indent}${k}:\n${formatTable(v, indent + '  ')}`;
        }
        return `${indent}${k}:\n${v.map((item) => `${indent}  - ${String(item)}`).join('\n')}`;
      }
      return `${indent}${k}:\n${formatText(v, indent + '  ')}`;
    })
    .join('\n');
}

function formatErrorDetails(details: unknown, indent = '  '): string {
  if (details === null || details === undefined) return '';

  const formatPathErrors = (rows: Record<string, unknown>[]): string => {
    return rows
      .map((row) => {
        const path = typeof row.path === 'string' && row.path.length > 0 ? row.path : '(unknown path)';
        const message =
          typeof row.message === 'string' && row.message.length > 0
            ? row.message
            : 'validation error';
        return `${indent}${path}: ${message}`;
      })
      .join('\n');
  };

  if (Array.isArray(details)) {
    if (details.length === 0) return '';
    if (details.every(isObjectRecord)) {
      return formatPathErrors(details);
    }
    return `${indent}details:\n${formatText(details, indent + '  ')}`;
  }

  if (isObjectRecord(details)) {
    const detailLines: string[] = [];

    for (const [key, value] of Object.entries(details)) {
      if (key === 'errors' && Array.isArray(value)) continue;
      if (value === null || value === undefined) continue;
      if (typeof value === 'object') {
        detailLines.push(`${indent}${key}:`);
        detailLines.push(formatText(value, indent + '  '));
      } else {
        detailLines.push(`${indent}${key}: ${String(value)}`);
      }
    }

    if (Array.isArray(details.errors) && details.errors.length > 0) {
      const errors: unknown[] = details.errors;
      detailLines.push(`${indent}errors:`);
      detailLines.push(
        errors.every(isObjectRecord) ? formatPathErrors(errors) : formatText(errors, indent + '  ')
      );
    }

    return detailLines.join('\n');
  }

  return `${indent}${String(details)}`;
}

/**
 * Write a document as-is (no envelope), e.g. an export to stdout.
 */
export function printRaw(content: string): void {
  process.stdout.write(content.endsWith('\n') ? content : `${content}\n`);
}
