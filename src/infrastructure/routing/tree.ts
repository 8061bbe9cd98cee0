/**
 * @fileoverview Route Tree - Segment tree behind the router
 *
 * @packageDocumentation
 * @module conduit/infrastructure/routing
 *
 * Every node stands for one path segment position. Children are tried in
 * a fixed priority order:
 *
 * ```
 *            literal  >  regex (registration order)  >  dynamic  >  glob
 * /users/me    "me"
 * /users/42              :id:[0-9]+
 * /users/ada                                              :name
 * /users/a/b                                                          *rest
 * ```
 *
 * A node holds any number of literal and regex children, at most one
 * dynamic child and at most one glob child, so each level offers a bounded
 * number of alternatives when traversal has to backtrack.
 *
 * Traversal looks for the first node, in priority order, that consumes the
 * whole path and has routes. Which route at that node serves the request
 * (method and other matchers) is decided afterwards by the router; a verb
 * mismatch there does not send traversal back to try other nodes.
 */

import { FrozenStructureError, RouteConfigurationError } from '../../domain/exceptions';
import { PipelineChain } from '../pipeline/set';
import { PathParamValues } from './extractors';
import { SegmentSpec, formatPattern } from './path';
import { Route } from './route';
import type { Router } from './router';

/**
 * Hand-off of every path below a node to another router
 */
export interface Delegation {
  router: Router;

  /** Pipelines run before the secondary router (empty without pipelines) */
  chain: PipelineChain;

  pattern: string;
}

export interface NamedChild {
  name: string;
  node: TreeNode;
}

export interface ConstrainedChild extends NamedChild {
  source: string;
  regex: RegExp;
}

export class TreeNode {
  readonly literals = new Map<string, TreeNode>();
  readonly constrained: ConstrainedChild[] = [];
  dynamic?: NamedChild;
  glob?: NamedChild;
  readonly routes: Route[] = [];
  delegation?: Delegation;

  get isRoutable(): boolean {
    return this.routes.length > 0;
  }

  get hasChildren(): boolean {
    return (
      this.literals.size > 0 ||
      this.constrained.length > 0 ||
      this.dynamic !== undefined ||
      this.glob !== undefined
    );
  }
}

/**
 * Result of a successful traversal
 */
export interface Traversal {
  node: TreeNode;
  params: PathParamValues;

  /** Number of request segments consumed */
  consumed: number;
}

export class RouteTree {
  readonly root = new TreeNode();
  private frozen = false;

  /**
   * Node for `specs`, creating missing nodes on the way
   *
   * @throws RouteConfigurationError on conflicting parameter names or when
   *   the path passes through a delegating node
   */
  nodeFor(specs: ReadonlyArray<SegmentSpec>): TreeNode {
    this.assertMutable();
    let node = this.root;
    const pattern = formatPattern(specs);

    for (const spec of specs) {
      if (node.delegation) {
        throw new RouteConfigurationError(
          `Cannot add routes below ${node.delegation.pattern}: it delegates to another router`,
          pattern,
        );
      }
      node = childFor(node, spec, pattern);
    }
    return node;
  }

  addRoute(specs: ReadonlyArray<SegmentSpec>, route: Route): TreeNode {
    const node = this.nodeFor(specs);
    if (node.delegation) {
      throw new RouteConfigurationError(
        `Cannot add a route at ${node.delegation.pattern}: it delegates to another router`,
        route.pattern,
      );
    }
    node.routes.push(route);
    return node;
  }

  addDelegation(specs: ReadonlyArray<SegmentSpec>, delegation: Delegation): void {
    if (specs.some((spec) => spec.kind === 'glob')) {
      throw new RouteConfigurationError('A delegating path cannot contain a glob', delegation.pattern);
    }
    const node = this.nodeFor(specs);
    if (node.delegation || node.isRoutable || node.hasChildren) {
      throw new RouteConfigurationError(
        'A delegating path must not have routes or other paths below it',
        delegation.pattern,
      );
    }
    node.delegation = delegation;
  }

  freeze(): void {
    this.frozen = true;
  }

  get isFrozen(): boolean {
    return this.frozen;
  }

  /**
   * Find the node serving `segments`
   */
  traverse(segments: ReadonlyArray<string>): Traversal | undefined {
    return walk(this.root, segments, 0, {});
  }

  private assertMutable(): void {
    if (this.frozen) {
      throw new FrozenStructureError('route tree');
    }
  }
}

function childFor(node: TreeNode, spec: SegmentSpec, pattern: string): TreeNode {
  switch (spec.kind) {
    case 'literal': {
      const existing = node.literals.get(spec.value);
      if (existing) {
        return existing;
      }
      const child = new TreeNode();
      node.literals.set(spec.value, child);
      return child;
    }

    case 'constrained': {
      const existing = node.constrained.find((c) => c.source === spec.source);
      if (existing) {
        if (existing.name !== spec.name) {
          throw new RouteConfigurationError(
            `Segment regex "${spec.source}" is already bound to ":${existing.name}", not ":${spec.name}"`,
            pattern,
          );
        }
        return existing.node;
      }
      const child = new TreeNode();
      node.constrained.push({ name: spec.name, source: spec.source, regex: spec.regex, node: child });
      return child;
    }

    case 'dynamic':
      node.dynamic = namedChild(node.dynamic, spec.name, ':', pattern);
      return node.dynamic.node;

    case 'glob':
      node.glob = namedChild(node.glob, spec.name, '*', pattern);
      return node.glob.node;
  }
}

function namedChild(
  existing: NamedChild | undefined,
  name: string,
  sigil: string,
  pattern: string,
): NamedChild {
  if (!existing) {
    return { name, node: new TreeNode() };
  }
  if (existing.name !== name) {
    throw new RouteConfigurationError(
      `Conflicting parameter names "${sigil}${existing.name}" and "${sigil}${name}" at the same position`,
      pattern,
    );
  }
  return existing;
}

function walk(
  node: TreeNode,
  segments: ReadonlyArray<string>,
  index: number,
  params: PathParamValues,
): Traversal | undefined {
  if (node.delegation) {
    return { node, params, consumed: index };
  }

  if (index === segments.length) {
    if (node.isRoutable) {
      return { node, params, consumed: index };
    }
    if (node.glob && node.glob.node.isRoutable) {
      return {
        node: node.glob.node,
        params: { ...params, [node.glob.name]: [] },
        consumed: index,
      };
    }
    return undefined;
  }

  const segment = segments[index];

  const literal = node.literals.get(segment);
  if (literal) {
    const found = walk(literal, segments, index + 1, params);
    if (found) {
      return found;
    }
  }

  for (const child of node.constrained) {
    if (child.regex.test(segment)) {
      const found = walk(child.node, segments, index + 1, { ...params, [child.name]: segment });
      if (found) {
        return found;
      }
    }
  }

  if (node.dynamic && segment !== '') {
    const found = walk(node.dynamic.node, segments, index + 1, {
      ...params,
      [node.dynamic.name]: segment,
    });
    if (found) {
      return found;
    }
  }

  if (node.glob && node.glob.node.isRoutable) {
    return {
      node: node.glob.node,
      params: { ...params, [node.glob.name]: segments.slice(index) },
      consumed: segments.length,
    };
  }

  return undefined;
}
