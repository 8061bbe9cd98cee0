/**
 * conduit - Route matchers
 *
 * Conditions a request must meet, beyond its path, for a route to accept
 * it. A matcher returns `undefined` to accept, or a {@link RouteNonMatch}
 * describing why it declined.
 */

import Negotiator from 'negotiator';
import { HttpStatus, RequestHeaders, getHeader } from '../platform/types';
import { RouteNonMatch } from './non-match';

/**
 * Request data available to matchers
 */
export interface MatchRequest {
  method: string;
  headers: RequestHeaders;
}

export interface RouteMatcher {
  match(request: MatchRequest): RouteNonMatch | undefined;
}

/**
 * Accepts requests whose method is one of `verbs`; declines with 405 and
 * the verb list otherwise
 */
export class MethodOnlyRouteMatcher implements RouteMatcher {
  readonly verbs: ReadonlyArray<string>;

  constructor(verbs: Iterable<string>) {
    this.verbs = [...new Set([...verbs].map((verb) => verb.toUpperCase()))];
  }

  match(request: MatchRequest): RouteNonMatch | undefined {
    if (this.verbs.includes(request.method.toUpperCase())) {
      return undefined;
    }
    return new RouteNonMatch(HttpStatus.METHOD_NOT_ALLOWED, this.verbs);
  }
}

/**
 * Accepts requests whose `Accept` header admits one of the supported media
 * types, or that send no `Accept` header; declines with 406
 *
 * @example
 * ```typescript
 * new AcceptHeaderRouteMatcher(['application/json', 'text/plain']);
 * ```
 */
export class AcceptHeaderRouteMatcher implements RouteMatcher {
  constructor(private readonly supportedMediaTypes: string[]) {}

  match(request: MatchRequest): RouteNonMatch | undefined {
    const accept = getHeader(request.headers, 'accept');
    if (accept === undefined) {
      return undefined;
    }

    const negotiator = new Negotiator({ headers: { accept } });
    if (negotiator.mediaType(this.supportedMediaTypes) !== undefined) {
      return undefined;
    }
    return new RouteNonMatch(HttpStatus.NOT_ACCEPTABLE);
  }
}

/**
 * Accepts requests whose `Content-Type` is one of the supported media
 * types (parameters such as `charset` are ignored); declines with 415,
 * including when the header is missing
 */
export class ContentTypeHeaderRouteMatcher implements RouteMatcher {
  private readonly supported: ReadonlySet<string>;

  constructor(supportedMediaTypes: string[]) {
    this.supported = new Set(supportedMediaTypes.map(essence));
  }

  match(request: MatchRequest): RouteNonMatch | undefined {
    const contentType = getHeader(request.headers, 'content-type');
    if (contentType !== undefined && this.supported.has(essence(contentType))) {
      return undefined;
    }
    return new RouteNonMatch(HttpStatus.UNSUPPORTED_MEDIA_TYPE);
  }
}

function essence(mediaType: string): string {
  return mediaType.split(';')[0].trim().toLowerCase();
}

/**
 * Accepts CORS preflight requests announcing `method` in
 * `Access-Control-Request-Method`; declines with 404
 */
export class AccessControlRequestMethodMatcher implements RouteMatcher {
  private readonly method: string;

  constructor(method: string) {
    this.method = method.toUpperCase();
  }

  match(request: MatchRequest): RouteNonMatch | undefined {
    const requested = getHeader(request.headers, 'access-control-request-method');
    if (requested !== undefined && requested.trim().toUpperCase() === this.method) {
      return undefined;
    }
    return new RouteNonMatch(HttpStatus.NOT_FOUND);
  }
}

/**
 * Accepts when both matchers accept
 */
export class AndRouteMatcher implements RouteMatcher {
  constructor(
    private readonly first: RouteMatcher,
    private readonly second: RouteMatcher,
  ) {}

  match(request: MatchRequest): RouteNonMatch | undefined {
    const a = this.first.match(request);
    const b = this.second.match(request);
    if (a && b) {
      return a.intersection(b);
    }
    return a ?? b;
  }
}

/**
 * Accepts every request
 */
export class AnyRouteMatcher implements RouteMatcher {
  match(): RouteNonMatch | undefined {
    return undefined;
  }
}

/**
 * Combine matchers; `undefined` entries are skipped
 */
export function allOf(...matchers: Array<RouteMatcher | undefined>): RouteMatcher {
  return matchers.reduce<RouteMatcher>(
    (combined, next) => (next ? new AndRouteMatcher(combined, next) : combined),
    new AnyRouteMatcher(),
  );
}
