/**
 * conduit - Path and query string extractors
 *
 * A route may declare a zod schema for its captured path segments and one
 * for its query string. The raw captures are validated (and coerced, with
 * `z.coerce`) before any middleware of the route runs; a failure ends the
 * request with 400 Bad Request.
 *
 * @example
 * ```typescript
 * route
 *   .get('/products/:id')
 *   .withPathExtractor(z.object({ id: z.coerce.number().int().positive() }))
 *   .withQueryStringExtractor(z.object({ currency: z.enum(['EUR', 'USD']).default('EUR') }))
 *   .to(({ params, query }) => showProduct(params.id, query.currency));
 * ```
 */

import { z } from 'zod';
import { ExtractionException, ExtractionIssue } from '../../domain/exceptions';

/**
 * Schema producing `T` from raw captures
 */
export type Extractor<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

/**
 * Raw path captures: dynamic and regex segments as text, globs as lists
 */
export type PathParamValues = Readonly<Record<string, string | string[]>>;

/**
 * Validate `input` against `extractor`
 *
 * @throws ExtractionException
 */
export function runExtractor<T>(
  extractor: Extractor<T>,
  source: 'path' | 'query',
  input: unknown,
): T {
  const result = extractor.safeParse(input);
  if (result.success) {
    return result.data;
  }

  const issues: ExtractionIssue[] = result.error.issues.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
  }));
  const label = source === 'path' ? 'path parameters' : 'query string';
  throw new ExtractionException(source, `Invalid ${label}`, issues);
}
