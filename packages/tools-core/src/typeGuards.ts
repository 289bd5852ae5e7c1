import type { JsonPart, Part, TextPart } from './index.js';

export function isTextPart(part: Part): part is TextPart {
  return part.type === 'text';
}

export function isJsonPart(part: Part): part is JsonPart {
  return part.type === 'json';
}

export function mapWhen<T, J>(
  parts: Part[],
  mapper: {
    text?: (part: TextPart) => T | undefined;
    json?: (part: JsonPart) => J | undefined;
  },
): (T | J)[] {
  const results: (T | J)[] = [];
  for (const part of parts) {
    let result: T | J | undefined;
    if (isTextPart(part) && mapper.text) {
      result = mapper.text(part);
    } else if (isJsonPart(part) && mapper.json) {
      result = mapper.json(part);
    }
    if (result !== undefined) {
      results.push(result);
    }
  }
  return results;
}
