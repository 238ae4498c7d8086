// Normalizes the many shapes a hosted-model runner can return into one URL

import { UnrecognizedProviderResponseError } from '../utils/errors';

function isHttpUrl(value: unknown): value is string {
  return typeof value === 'string' && /^https?:\/\//i.test(value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// Replicate's FileOutput exposes url() returning a URL; older clients and
// other runners give a `url` string, a URL-like `href`, or only a local `path`.
function fileHandleUrl(value: unknown): string | undefined {
  if (value instanceof URL) return value.href;
  if (typeof value !== 'object' || value === null) return undefined;

  if ('url' in value) {
    const url = value.url;
    if (typeof url === 'function') {
      const result: unknown = url.call(value);
      if (result instanceof URL) return result.href;
      if (typeof result === 'string' && result !== '') return result;
    }
    if (typeof url === 'string' && url !== '') return url;
  }
  if ('href' in value && typeof value.href === 'string' && value.href !== '') return value.href;
  if ('path' in value && typeof value.path === 'string' && value.path !== '') return `file://${value.path}`;
  return undefined;
}

function isFileHandle(value: unknown): boolean {
  if (value instanceof URL) return true;
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return false;
  return 'url' in value || 'href' in value || 'path' in value;
}

export function describeShape(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) {
    return `array(${value.length})${value.length > 0 ? `<${describeShape(value[0])}>` : ''}`;
  }
  if (isRecord(value)) {
    const proto: unknown = Object.getPrototypeOf(value);
    const name = proto !== null && proto !== Object.prototype && typeof proto === 'object' && 'constructor' in proto && typeof proto.constructor === 'function'
      ? proto.constructor.name
      : 'object';
    return `${name}{${Object.keys(value).join(',')}}`;
  }
  return typeof value;
}

function scanList(items: unknown[]): string | undefined {
  for (const item of items) {
    if (isHttpUrl(item)) return item;
    if (isRecord(item)) {
      for (const nested of Object.values(item)) {
        if (isHttpUrl(nested)) return nested;
      }
    }
  }
  return undefined;
}

function scanDict(dict: Record<string, unknown>): string | undefined {
  for (const value of Object.values(dict)) {
    if (isHttpUrl(value)) return value;
    if (Array.isArray(value) && value.length > 0) {
      const first = value[0];
      if (isHttpUrl(first)) return first;
      if (isFileHandle(first)) {
        const url = fileHandleUrl(first);
        if (url) return url;
      }
    }
  }
  return undefined;
}

/**
 * Extraction order: first list element as URL, first list element as file
 * handle, any list element, then dictionary values (one level of nested
 * lists). Plain strings and single file handles are taken as-is.
 */
export function extractImageUrl(output: unknown): string {
  if (Array.isArray(output) && output.length > 0) {
    const first = output[0];
    if (isHttpUrl(first)) return first;
    if (isFileHandle(first)) {
      const url = fileHandleUrl(first);
      if (url) return url;
    }
    const scanned = scanList(output);
    if (scanned) return scanned;
  }

  if (typeof output === 'string' && output !== '') return output;

  if (isFileHandle(output)) {
    const url = fileHandleUrl(output);
    if (url) return url;
  }

  if (isRecord(output)) {
    const scanned = scanDict(output);
    if (scanned) return scanned;
  }

  throw new UnrecognizedProviderResponseError(describeShape(output));
}
