/**
 * Route Address Compiler
 *
 * Compiles human-written route patterns into anchored matchers.
 *
 * Syntax:
 * - literal segments: `/users/active`
 * - free capture: `/{name}` (matches anything, slashes included)
 * - constrained capture: `/{id:[0-9]+}`
 * - catch-all: `*`
 */

import { RouteConfigurationError } from '../http/errors.ts';
import type { RouteParams } from '../http/types.ts';

const VARIABLE_SEGMENT = /^\{(?<name>\w+)(?::(?<pattern>.*))?\}$/;
const DEFAULT_VARIABLE_PATTERN = '.*';

export class RouteAddress {
  readonly raw: string;
  readonly matcher: RegExp;
  readonly variableNames: readonly string[];

  private constructor(raw: string, matcher: RegExp, variableNames: string[]) {
    this.raw = raw;
    this.matcher = matcher;
    this.variableNames = Object.freeze([...variableNames]);
    Object.freeze(this);
  }

  /**
   * Test a normalized request path
   */
  matches(path: string): boolean {
    return this.matcher.test(path);
  }

  /**
   * Captured variables for a path, or null when it does not match
   */
  extract(path: string): RouteParams | null {
    const match = this.matcher.exec(path);
    if (!match) {
      return null;
    }

    const params: RouteParams = {};
    for (const name of this.variableNames) {
      params[name] = match.groups?.[name] ?? '';
    }
    return params;
  }

  toString(): string {
    return this.raw;
  }

  /**
   * Compile a pattern, failing fast on malformed syntax
   */
  static compile(raw: string): RouteAddress {
    if (raw === '*') {
      return new RouteAddress(raw, /^.*$/, []);
    }

    const variableNames: string[] = [];
    const pieces: string[] = [];

    for (const segment of raw.split('/')) {
      if (segment.length === 0) continue;

      const match = VARIABLE_SEGMENT.exec(segment);
      if (!match?.groups) {
        if (segment.includes('{') || segment.includes('}')) {
          throw new RouteConfigurationError(raw, `malformed variable segment "${segment}"`);
        }
        pieces.push(escapeLiteral(segment));
        continue;
      }

      const name = match.groups.name ?? '';
      if (variableNames.includes(name)) {
        throw new RouteConfigurationError(raw, `variable "${name}" declared twice`);
      }

      const pattern = match.groups.pattern || DEFAULT_VARIABLE_PATTERN;
      variableNames.push(name);
      pieces.push(`(?<${name}>${pattern})`);
    }

    return new RouteAddress(raw, buildMatcher(raw, pieces), variableNames);
  }
}

function buildMatcher(raw: string, pieces: string[]): RegExp {
  try {
    return new RegExp(`^/${pieces.join('/')}$`);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new RouteConfigurationError(raw, reason);
  }
}

function escapeLiteral(segment: string): string {
  return segment.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
