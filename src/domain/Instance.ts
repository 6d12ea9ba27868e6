import { type Metadata } from '../condition/MatchOutcome.js';
import { type MountEdge, type NodeType } from './NodeType.js';
import { Route, edgeNode } from './Route.js';
import { type ResourceTree } from '../builder/ResourceTree.js';
import { resolve, spawn, tryResolve } from '../traversal/Resolver.js';
import { type AncestorQuery, findAncestor, lineage, resolvePath } from '../traversal/Lineage.js';

/** Fields every instance is created with. */
export interface InstanceInit {
    readonly tree: ResourceTree;
    readonly nodeType: NodeType;
    readonly name: string;
    readonly parent: Instance | null;
    /** Edge that produced the instance; `null` for the root */
    readonly edge: MountEdge | null;
    readonly metadata: Metadata;
    readonly payload: unknown;
}

/**
 * A location-aware resource: one node of a resolved path.
 *
 * Instances are created fresh by every lookup and never cached. A child
 * references its parent; parents never reference their children.
 *
 * @example
 * ```typescript
 * const root = tree.createRoot();
 * const user = root.resolvePath(['users', '1']);
 *
 * user.name;              // "1"
 * user.metadata.user_id;  // 1
 * user.parent()?.name;    // "users"
 * String(user);           // "<User: /users/1/>"
 * ```
 */
export class Instance {
    readonly tree: ResourceTree;
    readonly nodeType: NodeType;
    /** The segment this instance was resolved from (`''` for the root) */
    readonly name: string;
    readonly edge: MountEdge | null;
    /** Values extracted by the matching condition */
    readonly metadata: Metadata;
    /** Value handed to the init hook, if any */
    readonly payload: unknown;

    private readonly _parent: Instance | null;
    private _route?: Route;

    constructor(init: InstanceInit) {
        this.tree = init.tree;
        this.nodeType = init.nodeType;
        this.name = init.name;
        this.edge = init.edge;
        this.metadata = init.metadata;
        this.payload = init.payload;
        this._parent = init.parent;
    }

    // ── Location ──

    /** Direct parent, `null` for the root. */
    parent(): Instance | null {
        return this._parent;
    }

    /** Route from the root, carrying the actual segments. */
    get route(): Route {
        if (this._route === undefined) {
            this._route = this._parent === null || this.edge === null
                ? Route.root(this.nodeType, this.name)
                : this._parent.route.append(edgeNode(this.edge, this.name));
        }
        return this._route;
    }

    /**
     * Resolved path, e.g. `/users/1/`. Segments are joined as they are, so
     * a segment containing `/` is not escaped.
     */
    get uri(): string {
        return this.route.uri;
    }

    /** This instance, then each ancestor up to the root. */
    lineage(): Generator<Instance, void, undefined> {
        return lineage(this);
    }

    findAncestor(query: AncestorQuery): Instance | null {
        return findAncestor(this, query);
    }

    // ── Children ──

    /**
     * Resolve one child.
     *
     * @throws {ChildNotFoundError} If the segment matches no mount
     */
    get(segment: string, payload?: unknown): Instance {
        return resolve(this, segment, payload);
    }

    /** Resolve one child, or return `fallback` when it does not exist. */
    tryGet<T>(segment: string, fallback: T): Instance | T {
        return tryResolve(this, segment, fallback);
    }

    /**
     * Resolve several segments in turn.
     *
     * @throws {ChildNotFoundError} With the number of consumed segments
     */
    resolvePath(segments: Iterable<string>): Instance {
        return resolvePath(this, segments);
    }

    /** Create a child through one named mount, handing `payload` to its init hook. */
    spawn(mountName: string, segment: string, payload?: unknown): Instance {
        return spawn(this, mountName, segment, payload);
    }

    /**
     * Construct a child without running its init hook. Used by the resolver.
     *
     * @internal
     */
    adopt(edge: MountEdge, segment: string, metadata: Metadata, payload: unknown): Instance {
        return new Instance({
            tree: this.tree,
            nodeType: edge.child,
            name: segment,
            parent: this,
            edge,
            metadata,
            payload,
        });
    }

    // ── Identity ──

    /**
     * Same node types resolved from the same segments, level by level.
     * Compares the lineage rather than `uri`, which two instances can share
     * when a segment contains `/`.
     */
    equals(other: Instance): boolean {
        let a: Instance | null = this;
        let b: Instance | null = other;
        for (; a !== null && b !== null; a = a.parent(), b = b.parent()) {
            if (a === b) return true;
            if (a.nodeType !== b.nodeType || a.name !== b.name) return false;
        }
        return a === b;
    }

    toString(): string {
        return `<${this.nodeType.name}: ${this.uri}>`;
    }
}
