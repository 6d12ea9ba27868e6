import { type Condition, isBoundedRecursion, isRecursive } from '../condition/Condition.js';
import { type Instance } from './Instance.js';
import { ConfigurationError } from '../errors.js';

/**
 * Called once for every instance created through resolution, after its
 * parent, name and metadata are set. Throw {@link NodeNotExistError} (or one
 * of the type's `notExist` classes) to report a missing entity.
 */
export type InitHook = (instance: Instance, payload: unknown) => void;

/** Constructor of an error class an init hook may throw for "absent". */
export type ErrorClass = abstract new (...args: never[]) => Error;

export interface NodeTypeOptions {
    readonly description?: string;
    readonly onInit?: InitHook;
    /** Errors from `onInit` that mean "entity absent" */
    readonly notExist?: readonly ErrorClass[];
}

// ── Mount edges ──────────────────────────────────────────

/** A child mounted under one exact literal. */
export interface StaticEdge {
    readonly kind: 'static';
    readonly parent: NodeType;
    readonly child: NodeType;
    readonly literal: string;
    /** Guard evaluated against the candidate route */
    readonly complies?: Condition;
}

/** A set of children mounted under every segment a condition matches. */
export interface DynamicEdge {
    readonly kind: 'dynamic';
    readonly parent: NodeType;
    readonly child: NodeType;
    readonly condition: Condition;
    /** Key of the extracted value, and the `{placeholder}` of routes */
    readonly metaname: string;
    readonly complies?: Condition;
}

export type MountEdge = StaticEdge | DynamicEdge;

/** Name a mount is addressed by: its literal, or its metaname. */
export function edgeName(edge: MountEdge): string {
    return edge.kind === 'static' ? edge.literal : edge.metaname;
}

/** `true` if the edge may close a cycle (it carries a `recursion` condition). */
export function isRecursiveEdge(edge: MountEdge): boolean {
    return (edge.kind === 'dynamic' && isRecursive(edge.condition)) || isRecursive(edge.complies);
}

/** `true` if the edge's recursion has a finite depth limit. */
export function isBoundedEdge(edge: MountEdge): boolean {
    return (edge.kind === 'dynamic' && isBoundedRecursion(edge.condition)) || isBoundedRecursion(edge.complies);
}

// ============================================================================
// NodeType
// ============================================================================

/**
 * A declared resource kind.
 *
 * Holds the ordered mount edges of its children and the node types it is
 * itself mounted under. A type may be mounted under several parents, each
 * mounting being an independent edge (many-to-many, like a shared
 * collection reachable from two places).
 *
 * Node types are written only while the tree is declared. Building a
 * {@link ResourceTree} or enumerating routes seals every reachable type,
 * after which mounting under it raises {@link ConfigurationError}.
 *
 * @example
 * ```typescript
 * const Users = defineNode('Users');
 * const User = defineNode('User', { onInit: loadUser });
 * mountDynamic(Users, decimalId, User, 'user_id');
 *
 * Users.edges.length;       // 1
 * User.parentTypes;         // [Users]
 * ```
 */
export class NodeType {
    readonly name: string;
    readonly description: string | undefined;
    readonly onInit: InitHook | undefined;
    readonly notExist: readonly ErrorClass[];

    private readonly _edges: MountEdge[] = [];
    private readonly _staticEdges = new Map<string, StaticEdge>();
    private readonly _dynamicEdges: DynamicEdge[] = [];
    private readonly _parentTypes: NodeType[] = [];
    private _sealed = false;

    constructor(name: string, options: NodeTypeOptions = {}) {
        this.name = name;
        this.description = options.description;
        this.onInit = options.onInit;
        this.notExist = Object.freeze([...(options.notExist ?? [])]);
    }

    /** All child edges, in registration order. */
    get edges(): readonly MountEdge[] {
        return this._edges;
    }

    get staticEdges(): ReadonlyMap<string, StaticEdge> {
        return this._staticEdges;
    }

    get dynamicEdges(): readonly DynamicEdge[] {
        return this._dynamicEdges;
    }

    /** Types this one is mounted under, in mounting order. */
    get parentTypes(): readonly NodeType[] {
        return this._parentTypes;
    }

    get sealed(): boolean {
        return this._sealed;
    }

    /** Returns `true` if nothing mounts this type. */
    isRoot(): boolean {
        return this._parentTypes.length === 0;
    }

    /**
     * Look up a mount by literal or metaname: the static edge with that
     * literal if there is one, otherwise the first dynamic edge registered
     * with that metaname.
     */
    namedEdge(name: string): MountEdge | undefined {
        return this._staticEdges.get(name)
            ?? this._dynamicEdges.find(edge => edge.metaname === name);
    }

    /**
     * Append an edge. Called by `mountStatic()` / `mountDynamic()`, which
     * validate it first.
     *
     * @internal
     */
    addEdge(edge: MountEdge): void {
        if (this._sealed) {
            throw new ConfigurationError(
                `Node type "${this.name}" is sealed. ` +
                `Mounts must be declared before the tree is built or traversed.`,
            );
        }
        this._edges.push(edge);
        if (edge.kind === 'static') {
            this._staticEdges.set(edge.literal, edge);
        } else {
            this._dynamicEdges.push(edge);
        }
        if (!edge.child._parentTypes.includes(this)) {
            edge.child._parentTypes.push(this);
        }
    }

    /** @internal */
    seal(): void {
        if (this._sealed) return;
        this._sealed = true;
        Object.freeze(this._edges);
        Object.freeze(this._dynamicEdges);
    }

    toString(): string {
        return this.name;
    }
}
