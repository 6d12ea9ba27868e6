import { type NodeType, type MountEdge } from './NodeType.js';

/**
 * One position of a route.
 *
 * Routes built from instances carry the actual `segment` of every node.
 * Routes built by the enumerator leave dynamic segments undefined and
 * render them as `{metaname}`.
 */
export interface RouteNode {
    readonly nodeType: NodeType;
    /** Edge that mounted this node; `null` for the root */
    readonly edge: MountEdge | null;
    /** The static literal, when mounted through a static edge */
    readonly literal: string | undefined;
    /** The resolved segment (instances only) */
    readonly segment: string | undefined;
}

/** Node for the root of a tree. */
export function rootNode(nodeType: NodeType, segment?: string): RouteNode {
    return { nodeType, edge: null, literal: undefined, segment };
}

/** Node produced by mounting `edge`, optionally with a concrete segment. */
export function edgeNode(edge: MountEdge, segment?: string): RouteNode {
    return {
        nodeType: edge.child,
        edge,
        literal: edge.kind === 'static' ? edge.literal : undefined,
        segment,
    };
}

function label(node: RouteNode): string {
    if (node.segment !== undefined) return node.segment;
    if (node.edge === null) return '';
    return node.edge.kind === 'static' ? node.edge.literal : `{${node.edge.metaname}}`;
}

/**
 * Immutable sequence of route nodes, from the root to a terminal node.
 *
 * @example
 * ```typescript
 * for (const route of routes(Root)) {
 *     console.log(String(route));  // "/", "/users/", "/users/{user_id}/", ...
 * }
 * ```
 */
export class Route implements Iterable<RouteNode> {
    readonly nodes: readonly RouteNode[];
    private _uri?: string;

    private constructor(nodes: readonly RouteNode[]) {
        this.nodes = Object.freeze(nodes);
    }

    /** Route made of the root node alone. */
    static root(nodeType: NodeType, segment?: string): Route {
        return new Route([rootNode(nodeType, segment)]);
    }

    get length(): number {
        return this.nodes.length;
    }

    /** The last node (the candidate, while a condition is evaluated). */
    get last(): RouteNode {
        return this.nodes[this.nodes.length - 1];
    }

    /** Node type the route leads to. */
    get terminal(): NodeType {
        return this.last.nodeType;
    }

    /** Segment representations: literals, actual segments or `{metaname}`. */
    get segments(): readonly string[] {
        return this.nodes.slice(1).map(label);
    }

    /** Path template such as `/users/{user_id}/`. */
    get uri(): string {
        this._uri ??= `${this.nodes.map(label).join('/')}/`;
        return this._uri;
    }

    append(node: RouteNode): Route {
        return new Route([...this.nodes, node]);
    }

    /** Prefix holding the first `length` nodes. */
    slice(length: number): Route {
        return new Route(this.nodes.slice(0, length));
    }

    [Symbol.iterator](): Iterator<RouteNode> {
        return this.nodes[Symbol.iterator]();
    }

    toString(): string {
        return this.uri;
    }
}
