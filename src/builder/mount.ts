/**
 * mountStatic() / mountDynamic() — Mount Table Registration
 *
 * The two declaration operations of the tree. Each appends one edge to
 * the parent's ordered edge list; order is match priority for dynamic
 * edges and emission order for routes.
 *
 * @example
 * ```typescript
 * const Root = defineNode('Root');
 * const Users = defineNode('Users');
 * const User = defineNode('User');
 *
 * mountStatic(Root, 'users', Users);
 * mountDynamic(Users, decimalId, User, 'user_id');
 * ```
 *
 * @module
 */
import {
    type Condition,
    assertDisjointCaptures, defaultMetaname, isCondition, isRecursive,
} from '../condition/Condition.js';
import { ConfigurationError } from '../errors.js';
import {
    NodeType, isRecursiveEdge,
    type DynamicEdge, type NodeTypeOptions, type StaticEdge,
} from '../domain/NodeType.js';
import {
    DynamicMountOptionsSchema, LiteralSchema, MetanameSchema, NodeNameSchema,
    NodeTypeOptionsSchema, StaticMountOptionsSchema, parseConfig,
} from './schemas.js';

// ── Types ────────────────────────────────────────────────

export interface StaticMountOptions {
    /** Guard the candidate route must satisfy, e.g. `not(under('drafts'))` */
    readonly complies?: Condition;
}

export interface DynamicMountOptions {
    /** Metadata key and route placeholder; derived from the condition when absent */
    readonly metaname?: string;
    readonly complies?: Condition;
}

// ── Declaration ──────────────────────────────────────────

/**
 * Declare a node type.
 *
 * @throws {ConfigurationError} If the name is empty or an option is invalid
 */
export function defineNode(name: string, options: NodeTypeOptions = {}): NodeType {
    const parsedName = parseConfig(NodeNameSchema, name, 'defineNode');
    const parsed = parseConfig(NodeTypeOptionsSchema, options, `defineNode(${parsedName})`);
    return new NodeType(parsedName, parsed);
}

/**
 * Mount `child` under `parent` at the exact segment `literal`.
 *
 * @throws {ConfigurationError} On a literal already mounted under `parent`,
 *   a cycle without a `recursion` guard, or a sealed parent
 */
export function mountStatic(
    parent: NodeType,
    literal: string,
    child: NodeType,
    options: StaticMountOptions = {},
): StaticEdge {
    const subject = `mountStatic(${parent.name}, ${String(literal)})`;
    const name = parseConfig(LiteralSchema, literal, subject);
    const { complies } = parseConfig(StaticMountOptionsSchema, options, subject);

    assertLiteralFree(parent, name, subject);
    assertAcyclic(parent, child, isRecursive(complies), subject);

    const edge: StaticEdge = Object.freeze({
        kind: 'static',
        parent,
        child,
        literal: name,
        ...(complies !== undefined ? { complies } : {}),
    });
    parent.addEdge(edge);
    return edge;
}

/**
 * Mount `child` under `parent` for every segment `condition` matches.
 *
 * `options` may be the metaname alone. When no metaname is given it is
 * derived from the condition (`id` for `decimalId`). Metanames need not be
 * unique under a parent, nor distinct from its literals; see
 * {@link NodeType.namedEdge} for which mount `spawn` then addresses.
 *
 * @throws {ConfigurationError} On overlapping capture keys between condition
 *   and guard, an unsanctioned cycle or a sealed parent
 */
export function mountDynamic(
    parent: NodeType,
    condition: Condition,
    child: NodeType,
    options: string | DynamicMountOptions = {},
): DynamicEdge {
    const subject = `mountDynamic(${parent.name})`;
    if (!isCondition(condition)) {
        throw new ConfigurationError(`[${subject}] Expected a condition.`);
    }
    const raw = typeof options === 'string' ? { metaname: options } : options;
    const parsed = parseConfig(DynamicMountOptionsSchema, raw, subject);
    const metaname = parseConfig(MetanameSchema, parsed.metaname ?? defaultMetaname(condition), subject);
    const { complies } = parsed;

    if (complies !== undefined) {
        assertDisjointCaptures([condition, complies], subject);
    }
    assertAcyclic(parent, child, isRecursive(condition) || isRecursive(complies), subject);

    const edge: DynamicEdge = Object.freeze({
        kind: 'dynamic',
        parent,
        child,
        condition,
        metaname,
        ...(complies !== undefined ? { complies } : {}),
    });
    parent.addEdge(edge);
    return edge;
}

// ── Sealing ──────────────────────────────────────────────

/**
 * Seal every node type reachable from `root`. Called when a tree is
 * built or its routes enumerated; later mounts under these types fail.
 */
export function sealTree(root: NodeType): void {
    const pending: NodeType[] = [root];
    for (let type = pending.pop(); type !== undefined; type = pending.pop()) {
        if (type.sealed) continue;
        type.seal();
        for (const edge of type.edges) pending.push(edge.child);
    }
}

// ── Private helpers ──────────────────────────────────────

function assertLiteralFree(parent: NodeType, literal: string, subject: string): void {
    const existing = parent.staticEdges.get(literal);
    if (existing !== undefined) {
        throw new ConfigurationError(
            `[${subject}] "${literal}" is already mounted under "${parent.name}" ` +
            `(static mount of "${existing.child.name}").`,
        );
    }
}

function assertAcyclic(parent: NodeType, child: NodeType, recursive: boolean, subject: string): void {
    if (recursive) return;
    if (child === parent || reaches(child, parent)) {
        throw new ConfigurationError(
            `[${subject}] Mounting "${child.name}" under "${parent.name}" creates a cycle. ` +
            `Guard the mount with recursion() to allow it.`,
        );
    }
}

/** Whether `target` is reachable from `from` through ordinary (non-recursive) edges. */
function reaches(from: NodeType, target: NodeType): boolean {
    const seen = new Set<NodeType>();
    const pending: NodeType[] = [from];
    for (let type = pending.pop(); type !== undefined; type = pending.pop()) {
        if (type === target) return true;
        if (seen.has(type)) continue;
        seen.add(type);
        for (const edge of type.edges) {
            if (!isRecursiveEdge(edge)) pending.push(edge.child);
        }
    }
    return false;
}
