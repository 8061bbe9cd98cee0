/**
 * conduit - Route non-match
 *
 * Why a route declined a request: a status code and the verbs that would
 * have been accepted. When every route at a leaf declines, their reasons
 * are combined with {@link RouteNonMatch.union}; the conditions inside one
 * route are combined with {@link RouteNonMatch.intersection}.
 */

import { HttpStatus } from '../platform/types';

const STANDARD_VERBS = [
  'CONNECT',
  'DELETE',
  'GET',
  'HEAD',
  'OPTIONS',
  'PATCH',
  'POST',
  'PUT',
  'TRACE',
] as const;

/**
 * Verbs a non-match allows when the declining condition was not about the
 * method at all
 */
const DEFAULT_ALLOW: ReadonlyArray<string> = [
  'DELETE',
  'GET',
  'HEAD',
  'OPTIONS',
  'PATCH',
  'POST',
  'PUT',
];

function isClientError(status: number): boolean {
  return status >= 400 && status < 500;
}

/**
 * The more informative of two non-match statuses: 404 yields to anything,
 * then 405, then 406; among other client errors the first wins.
 */
export function higherPrecedenceStatus(lhs: number, rhs: number): number {
  if (lhs === HttpStatus.NOT_FOUND) return rhs;
  if (rhs === HttpStatus.NOT_FOUND) return lhs;
  if (lhs === HttpStatus.METHOD_NOT_ALLOWED) return rhs;
  if (rhs === HttpStatus.METHOD_NOT_ALLOWED) return lhs;
  if (lhs === HttpStatus.NOT_ACCEPTABLE) return rhs;
  if (rhs === HttpStatus.NOT_ACCEPTABLE) return lhs;
  if (isClientError(lhs)) return lhs;
  if (isClientError(rhs)) return rhs;
  return lhs;
}

/**
 * Order verbs the way they are listed in an `Allow` header: standard verbs
 * alphabetically, then extension verbs alphabetically
 */
export function sortVerbs(verbs: Iterable<string>): string[] {
  const all = new Set(verbs);
  const standard: string[] = STANDARD_VERBS.filter((verb) => all.has(verb));
  const extension = [...all]
    .filter((verb) => !standard.includes(verb))
    .sort();
  return [...standard, ...extension];
}

export class RouteNonMatch {
  private readonly allow: ReadonlySet<string>;

  constructor(
    readonly status: number,
    allow: Iterable<string> = DEFAULT_ALLOW,
  ) {
    this.allow = new Set(allow);
  }

  /**
   * Allowed verbs, in `Allow` header order
   */
  get allowedVerbs(): string[] {
    return sortVerbs(this.allow);
  }

  withAllowList(allow: Iterable<string>): RouteNonMatch {
    return new RouteNonMatch(this.status, allow);
  }

  /**
   * Both conditions declined: only verbs both allow remain
   */
  intersection(other: RouteNonMatch): RouteNonMatch {
    return new RouteNonMatch(
      higherPrecedenceStatus(this.status, other.status),
      [...this.allow].filter((verb) => other.allow.has(verb)),
    );
  }

  /**
   * Either alternative declined: verbs allowed by either remain
   */
  union(other: RouteNonMatch): RouteNonMatch {
    return new RouteNonMatch(
      higherPrecedenceStatus(this.status, other.status),
      [...this.allow, ...other.allow],
    );
  }
}
