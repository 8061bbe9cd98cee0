/**
 * conduit - Request path tokenization and route pattern parsing
 */

import { RouteConfigurationError } from '../../domain/exceptions';

/**
 * One segment of a route pattern
 */
export type SegmentSpec =
  | { kind: 'literal'; value: string }
  | { kind: 'constrained'; name: string; source: string; regex: RegExp }
  | { kind: 'dynamic'; name: string }
  | { kind: 'glob'; name: string };

const PARAM_NAME = /^[A-Za-z0-9_]*/;

/**
 * Split a request path into percent-decoded segments.
 *
 * The empty segment produced by the leading `/` and one trailing empty
 * segment are dropped; empty segments in the middle are kept.
 *
 * @returns the segments, or `undefined` when a segment is not valid
 *   percent-encoding
 *
 * @example
 * ```typescript
 * splitPath('/parts/a%20b/');  // ['parts', 'a b']
 * splitPath('/a//b');          // ['a', '', 'b']
 * splitPath('/');              // []
 * splitPath('/bad/%E0%A4%A');  // undefined
 * ```
 */
export function splitPath(path: string): string[] | undefined {
  const raw = path.split('/');

  if (raw.length > 0 && raw[0] === '') {
    raw.shift();
  }
  if (raw.length > 0 && raw[raw.length - 1] === '') {
    raw.pop();
  }

  const segments: string[] = [];
  for (const segment of raw) {
    const decoded = percentDecode(segment);
    if (decoded === undefined) {
      return undefined;
    }
    segments.push(decoded);
  }
  return segments;
}

/**
 * `decodeURIComponent`, with malformed input reported as `undefined`
 */
export function percentDecode(text: string): string | undefined {
  try {
    return decodeURIComponent(text);
  } catch (error) {
    if (error instanceof URIError) {
      return undefined;
    }
    throw error;
  }
}

/**
 * Parse a route pattern.
 *
 * Grammar, per `/`-separated segment:
 *
 * | Segment            | Matches                                                |
 * | ------------------ | ------------------------------------------------------ |
 * | `text`             | exactly `text`                                         |
 * | `:name`            | any one non-empty segment                              |
 * | `:name:<regex>`    | one segment matching `<regex>` in full                 |
 * | `:name\|<regex>`   | same as above                                          |
 * | `*name`            | the rest of the path, zero or more segments (last only) |
 *
 * @throws RouteConfigurationError
 */
export function parsePattern(pattern: string): SegmentSpec[] {
  const specs: SegmentSpec[] = [];

  for (const segment of pattern.split('/')) {
    if (segment === '') {
      continue;
    }

    const previous = specs[specs.length - 1];
    if (previous?.kind === 'glob') {
      throw new RouteConfigurationError(
        `Glob segment "*${previous.name}" must be the last segment`,
        pattern,
      );
    }

    specs.push(parseSegment(segment, pattern));
  }

  return specs;
}

function parseSegment(segment: string, pattern: string): SegmentSpec {
  if (segment.startsWith('*')) {
    return { kind: 'glob', name: requireName(segment.slice(1), pattern) };
  }

  if (!segment.startsWith(':')) {
    return { kind: 'literal', value: segment };
  }

  const body = segment.slice(1);
  const name = (PARAM_NAME.exec(body) ?? [''])[0];
  const rest = body.slice(name.length);
  requireName(name, pattern);

  if (rest === '') {
    return { kind: 'dynamic', name };
  }

  if (rest[0] !== ':' && rest[0] !== '|') {
    throw new RouteConfigurationError(
      `Invalid character "${rest[0]}" in parameter name "${body}"`,
      pattern,
    );
  }

  const source = rest.slice(1);
  return { kind: 'constrained', name, source, regex: compileSegmentRegex(source, pattern) };
}

function requireName(name: string, pattern: string): string {
  if (name === '') {
    throw new RouteConfigurationError('Parameter name must not be empty', pattern);
  }
  return name;
}

/**
 * Compile a segment constraint so that it must match the whole segment
 */
export function compileSegmentRegex(source: string, pattern?: string): RegExp {
  if (source === '') {
    throw new RouteConfigurationError('Segment regex must not be empty', pattern);
  }
  try {
    return new RegExp(`^(?:${source})$`);
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new RouteConfigurationError(`Invalid segment regex "${source}": ${error.message}`, pattern);
    }
    throw error;
  }
}

/**
 * Names of every parameter in `specs`
 *
 * @throws RouteConfigurationError when a name repeats
 */
export function assertUniqueParams(specs: ReadonlyArray<SegmentSpec>, pattern: string): void {
  const seen = new Set<string>();
  for (const spec of specs) {
    if (spec.kind === 'literal') {
      continue;
    }
    if (seen.has(spec.name)) {
      throw new RouteConfigurationError(`Duplicate parameter name "${spec.name}"`, pattern);
    }
    seen.add(spec.name);
  }
}

/**
 * Render specs back into pattern text
 */
export function formatPattern(specs: ReadonlyArray<SegmentSpec>): string {
  const text = specs
    .map((spec) => {
      switch (spec.kind) {
        case 'literal':
          return spec.value;
        case 'dynamic':
          return `:${spec.name}`;
        case 'constrained':
          return `:${spec.name}:${spec.source}`;
        case 'glob':
          return `*${spec.name}`;
      }
    })
    .join('/');
  return `/${text}`;
}
