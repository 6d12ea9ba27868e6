/**
 * Edge matching shared by the resolver and the route enumerator, so that
 * lookups and route templates apply the same tests in the same order.
 *
 * @module
 */
import { evaluate } from '../condition/evaluate.js';
import { type MatchOutcome, UNMATCHED, conjoin, matched } from '../condition/MatchOutcome.js';
import { type MountEdge, type NodeType, edgeName } from '../domain/NodeType.js';
import { type Route, edgeNode } from '../domain/Route.js';

/**
 * Test one edge for `segment` below the route `parentRoute`.
 *
 * A static edge requires the exact literal; a dynamic edge its condition.
 * The `complies` guard, if any, must hold as well. With an `undefined`
 * segment (dynamic edges during enumeration) segment tests are
 * undetermined and only route tests can reject.
 */
export function testEdge(edge: MountEdge, segment: string | undefined, parentRoute: Route): MatchOutcome {
    if (edge.kind === 'static' && segment !== undefined && segment !== edge.literal) {
        return UNMATCHED;
    }

    const context = {
        segment,
        route: parentRoute.append(edgeNode(edge, segment)),
        metaname: edgeName(edge),
    };
    const primary = edge.kind === 'static' ? matched() : evaluate(edge.condition, context);
    if (primary.status === 'unmatched' || edge.complies === undefined) return primary;
    return conjoin(primary, evaluate(edge.complies, context));
}

/**
 * Edges in precedence order: static edges by literal, then dynamic
 * edges in registration order.
 */
export function orderedEdges(type: NodeType): readonly MountEdge[] {
    const statics = [...type.staticEdges.values()]
        .sort((a, b) => (a.literal < b.literal ? -1 : a.literal > b.literal ? 1 : 0));
    return [...statics, ...type.dynamicEdges];
}
