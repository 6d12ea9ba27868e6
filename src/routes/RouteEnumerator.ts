/**
 * routes() — Static Route Enumeration
 *
 * Walks the declared node types (never instances) and lists every
 * canonical path template, e.g. `/users/{user_id}/posts/`.
 *
 * The walk is depth-first pre-order with an explicit stack: a route is
 * emitted, then its static edges by literal, then its dynamic edges in
 * registration order, which is the resolver's precedence.
 *
 * Guards are evaluated without segments. A branch is dropped only when a
 * guard rejects it outright (e.g. `not(under('drafts'))` below `drafts`).
 *
 * Cycles (sanctioned by `recursion()`): when an edge leads back to a type
 * already on the current path, the branch is emitted once and not
 * expanded, unless the loop it closes (from the earlier occurrence of the
 * type through the new edge) passes a recursion with a `maxDepth`. That
 * limit then ends the expansion, whichever edge of the loop carries it.
 *
 * @example
 * ```typescript
 * routes(Categories).map(String);
 * // ['/', '/{category_id}/', '/{category_id}/categories/',
 * //  '/{category_id}/categories/{category_id}/']
 * ```
 *
 * @module
 */
import { sealTree } from '../builder/mount.js';
import { type NodeType, isBoundedEdge } from '../domain/NodeType.js';
import { Route, edgeNode } from '../domain/Route.js';
import { type DebugObserverFn } from '../observability/DebugObserver.js';
import { orderedEdges, testEdge } from '../traversal/EdgeMatcher.js';

export interface RoutesOptions {
    readonly debug?: DebugObserverFn;
}

interface Frame {
    readonly route: Route;
    readonly expand: boolean;
}

/**
 * Every route of the tree rooted at `root`. Seals the reachable types.
 */
export function routes(root: NodeType, options: RoutesOptions = {}): Route[] {
    sealTree(root);
    const { debug } = options;
    const startTime = debug ? performance.now() : 0;

    const result: Route[] = [];
    const stack: Frame[] = [{ route: Route.root(root), expand: true }];

    for (let frame = stack.pop(); frame !== undefined; frame = stack.pop()) {
        result.push(frame.route);
        if (!frame.expand) continue;

        const children: Frame[] = [];
        for (const edge of orderedEdges(frame.route.terminal)) {
            const segment = edge.kind === 'static' ? edge.literal : undefined;
            if (testEdge(edge, segment, frame.route).status === 'unmatched') continue;

            const route = frame.route.append(edgeNode(edge));
            children.push({ route, expand: !closesUnboundedLoop(route) });
        }
        stack.push(...children.reverse());
    }

    debug?.({
        type: 'enumerate',
        root: root.name,
        routes: result.length,
        durationMs: performance.now() - startTime,
        timestamp: Date.now(),
    });
    return result;
}

/**
 * Whether the last node of `route` repeats an earlier type and no edge
 * between the two occurrences is a bounded recursion.
 */
function closesUnboundedLoop(route: Route): boolean {
    const { nodes } = route;
    const last = nodes.length - 1;
    const previous = nodes.slice(0, last).map(node => node.nodeType).lastIndexOf(route.terminal);
    if (previous === -1) return false;
    for (const node of nodes.slice(previous + 1)) {
        if (node.edge !== null && isBoundedEdge(node.edge)) return false;
    }
    return true;
}
