/**
 * Body Parsers
 *
 * Content-type specific decoders for request bodies. The registry tries
 * parsers in registration order and the first match decodes the body.
 */

import { HttpException } from './errors.ts';
import type { HeaderMap } from './types.ts';

export interface BodyParser {
  acceptableContentTypes(): string[];
  matches(headers: HeaderMap, body: string): boolean;
  parse(headers: HeaderMap, body: string): unknown;
}

/**
 * Matches when the content-type header contains one of the acceptable types
 */
export abstract class BaseParser implements BodyParser {
  abstract acceptableContentTypes(): string[];
  abstract parse(headers: HeaderMap, body: string): unknown;

  matches(headers: HeaderMap, _body: string): boolean {
    const contentType = headers['content-type'];
    if (contentType === undefined) {
      return false;
    }

    return this.acceptableContentTypes().some((type) => contentType.includes(type));
  }
}

export type FormValue = string | string[];

/**
 * application/x-www-form-urlencoded
 */
export class FormParser extends BaseParser {
  acceptableContentTypes(): string[] {
    return ['application/x-www-form-urlencoded'];
  }

  parse(_headers: HeaderMap, body: string): Record<string, FormValue> {
    const fields = new Map<string, FormValue>();

    for (const [key, value] of new URLSearchParams(body)) {
      const existing = fields.get(key);
      if (existing === undefined) {
        fields.set(key, value);
      } else if (Array.isArray(existing)) {
        existing.push(value);
      } else {
        fields.set(key, [existing, value]);
      }
    }

    // fromEntries defines own properties, so `__proto__` stays a field
    return Object.fromEntries(fields);
  }
}

export class JsonParser extends BaseParser {
  acceptableContentTypes(): string[] {
    return ['application/json'];
  }

  parse(_headers: HeaderMap, body: string): unknown {
    return JSON.parse(body);
  }
}

/**
 * text/plain, or in fallback mode any content type at all
 */
export class PlainTextParser extends BaseParser {
  private readonly isFallback: boolean;

  constructor(isFallback = false) {
    super();
    this.isFallback = isFallback;
  }

  acceptableContentTypes(): string[] {
    return ['text/plain'];
  }

  override matches(headers: HeaderMap, body: string): boolean {
    if (this.isFallback) {
      return true;
    }
    return super.matches(headers, body);
  }

  parse(_headers: HeaderMap, body: string): string {
    return body;
  }
}

/**
 * Ordered set of parsers consulted for every non-empty body
 */
export class BodyParserRegistry {
  private readonly parsers: readonly BodyParser[];

  constructor(parsers: BodyParser[] = []) {
    this.parsers = [...parsers];
  }

  /**
   * Union of every parser's accepted types, in registration order
   */
  acceptableContentTypes(): string[] {
    return this.parsers.flatMap((parser) => parser.acceptableContentTypes());
  }

  /**
   * Decode a raw body, or return undefined when there is none
   */
  resolve(headers: HeaderMap, body: string): unknown {
    if (body.length === 0) {
      return undefined;
    }

    const parser = this.parsers.find((candidate) => candidate.matches(headers, body));
    if (!parser) {
      throw HttpException.unsupportedMediaType(
        headers['content-type'] ?? '',
        this.acceptableContentTypes()
      );
    }

    return parser.parse(headers, body);
  }
}

/**
 * Form, JSON and a plain-text fallback, in that order
 */
export function defaultParsers(): BodyParser[] {
  return [new FormParser(), new JsonParser(), new PlainTextParser(true)];
}
