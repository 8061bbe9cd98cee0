/**
 * @file Route Matcher and Non-match Unit Tests
 */

import { describe, it, expect } from '@jest/globals';
import {
  AcceptHeaderRouteMatcher,
  AccessControlRequestMethodMatcher,
  AndRouteMatcher,
  AnyRouteMatcher,
  ContentTypeHeaderRouteMatcher,
  MethodOnlyRouteMatcher,
  RouteNonMatch,
  allOf,
  higherPrecedenceStatus,
  sortVerbs,
} from '../../../src/index';

describe('Route matchers', () => {
  describe('MethodOnlyRouteMatcher', () => {
    it('should accept listed verbs in any case', () => {
      const matcher = new MethodOnlyRouteMatcher(['get', 'HEAD', 'GET']);

      expect(matcher.verbs).toEqual(['GET', 'HEAD']);
      expect(matcher.match({ method: 'get', headers: {} })).toBeUndefined();
    });

    it('should decline with 405 and the accepted verbs', () => {
      const reason = new MethodOnlyRouteMatcher(['GET']).match({ method: 'PUT', headers: {} });

      expect(reason?.status).toBe(405);
      expect(reason?.allowedVerbs).toEqual(['GET']);
    });
  });

  describe('AcceptHeaderRouteMatcher', () => {
    const matcher = new AcceptHeaderRouteMatcher(['application/json', 'text/plain']);

    it('should accept requests without an Accept header', () => {
      expect(matcher.match({ method: 'GET', headers: {} })).toBeUndefined();
    });

    it.each(['application/json', 'application/*', '*/*', 'text/html, text/plain;q=0.5'])(
      'should accept %s',
      (accept) => {
        expect(matcher.match({ method: 'GET', headers: { accept } })).toBeUndefined();
      },
    );

    it('should decline with 406 when nothing acceptable is offered', () => {
      const reason = matcher.match({ method: 'GET', headers: { Accept: 'text/html' } });

      expect(reason?.status).toBe(406);
    });
  });

  describe('ContentTypeHeaderRouteMatcher', () => {
    const matcher = new ContentTypeHeaderRouteMatcher(['application/json']);

    it('should ignore media type parameters and case', () => {
      expect(
        matcher.match({ method: 'POST', headers: { 'content-type': 'Application/JSON; charset=utf-8' } }),
      ).toBeUndefined();
    });

    it('should decline with 415 when the type is missing or unsupported', () => {
      expect(matcher.match({ method: 'POST', headers: {} })?.status).toBe(415);
      expect(
        matcher.match({ method: 'POST', headers: { 'content-type': 'text/plain' } })?.status,
      ).toBe(415);
    });
  });

  describe('AccessControlRequestMethodMatcher', () => {
    it('should match the announced preflight method', () => {
      const matcher = new AccessControlRequestMethodMatcher('put');

      expect(
        matcher.match({ method: 'OPTIONS', headers: { 'access-control-request-method': 'PUT' } }),
      ).toBeUndefined();
      expect(matcher.match({ method: 'OPTIONS', headers: {} })?.status).toBe(404);
    });
  });

  describe('AndRouteMatcher', () => {
    it('should intersect the reasons when both decline', () => {
      const matcher = new AndRouteMatcher(
        new MethodOnlyRouteMatcher(['POST']),
        new ContentTypeHeaderRouteMatcher(['application/json']),
      );

      const reason = matcher.match({ method: 'GET', headers: {} });

      expect(reason?.status).toBe(415);
      expect(reason?.allowedVerbs).toEqual(['POST']);
    });

    it('should report the single declining reason', () => {
      const matcher = allOf(
        new MethodOnlyRouteMatcher(['POST']),
        undefined,
        new ContentTypeHeaderRouteMatcher(['application/json']),
      );

      const reason = matcher.match({
        method: 'GET',
        headers: { 'content-type': 'application/json' },
      });

      expect(reason?.status).toBe(405);
      expect(reason?.allowedVerbs).toEqual(['POST']);
    });

    it('should accept when every member accepts', () => {
      expect(allOf().match({ method: 'GET', headers: {} })).toBeUndefined();
    });
  });

  describe('AnyRouteMatcher', () => {
    it('should accept every request', () => {
      expect(new AnyRouteMatcher().match()).toBeUndefined();
    });

    it('should leave the other member of an And in charge', () => {
      const matcher = new AndRouteMatcher(new AnyRouteMatcher(), new MethodOnlyRouteMatcher(['GET']));

      expect(matcher.match({ method: 'GET', headers: {} })).toBeUndefined();
      expect(matcher.match({ method: 'PUT', headers: {} })?.status).toBe(405);
    });
  });
});

describe('RouteNonMatch', () => {
  it.each([
    [404, 405, 405],
    [405, 404, 405],
    [405, 406, 406],
    [406, 415, 415],
    [415, 406, 415],
    [400, 415, 400],
    [500, 415, 415],
  ])('should rank %i against %i as %i', (lhs, rhs, expected) => {
    expect(higherPrecedenceStatus(lhs, rhs)).toBe(expected);
  });

  it('should list standard verbs before extension verbs', () => {
    expect(sortVerbs(['PURGE', 'PUT', 'GET', 'BREW', 'DELETE', 'GET'])).toEqual([
      'DELETE',
      'GET',
      'PUT',
      'BREW',
      'PURGE',
    ]);
  });

  it('should allow every common verb by default', () => {
    expect(new RouteNonMatch(406).allowedVerbs).toEqual([
      'DELETE',
      'GET',
      'HEAD',
      'OPTIONS',
      'PATCH',
      'POST',
      'PUT',
    ]);
  });

  it('should unite and intersect allow lists', () => {
    const get = new RouteNonMatch(405, ['GET']);
    const put = new RouteNonMatch(405, ['PUT', 'GET']);

    expect(get.union(put).allowedVerbs).toEqual(['GET', 'PUT']);
    expect(get.intersection(put).allowedVerbs).toEqual(['GET']);
    expect(get.withAllowList(['HEAD']).allowedVerbs).toEqual(['HEAD']);
  });
});
