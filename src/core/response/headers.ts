// src/core/response/headers.ts

import type { HeaderMap, ResponseWriter, ValuesMap } from './types';

/**
 * Append every stored value to the writer, keeping multi-value order.
 */
export function copyHeaders(writer: ResponseWriter, headers: HeaderMap): void {
  for (const [name, values] of Object.entries(headers)) {
    for (const value of values) {
      writer.appendHeader(name, value);
    }
  }
}

/**
 * Build a ValuesMap from single values, skipping empty ones.
 */
export function valuesOf(entries: Record<string, string | undefined>): ValuesMap {
  const values: ValuesMap = {};
  for (const [key, value] of Object.entries(entries)) {
    if (value) values[key] = [value];
  }
  return values;
}

/**
 * Form-encode a ValuesMap with keys sorted; values of one key keep their order.
 */
export function encodeValues(values: ValuesMap, base?: URLSearchParams): string {
  const params = new URLSearchParams(base);
  for (const [key, list] of Object.entries(values)) {
    for (const value of list) {
      params.append(key, value);
    }
  }
  params.sort();
  return params.toString();
}
