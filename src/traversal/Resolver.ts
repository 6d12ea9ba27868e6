/**
 * Resolver — One Segment to One Child
 *
 * Resolution order:
 *
 * 1. A static edge whose literal equals the segment wins unconditionally,
 *    even if a dynamic condition would match too. If its guard rejects
 *    the route the lookup fails; dynamic edges are not consulted.
 * 2. Otherwise dynamic edges are tried in registration order; the first
 *    whose condition and guard match wins.
 * 3. The child is created (name, parent, metadata) and the child type's
 *    init hook runs. "Absent" signals from the hook become
 *    {@link ChildNotFoundError}; any other error propagates unchanged.
 *
 * @module
 */
import { type Metadata } from '../condition/MatchOutcome.js';
import { ChildNotFoundError, NodeNotExistError } from '../errors.js';
import { type Instance } from '../domain/Instance.js';
import { type MountEdge, type NodeType } from '../domain/NodeType.js';
import { type MissReason } from '../observability/DebugObserver.js';
import { testEdge } from './EdgeMatcher.js';

// ── Edge selection ───────────────────────────────────────

export type EdgeSelection =
    | { readonly ok: true; readonly edge: MountEdge; readonly metadata: Metadata }
    | { readonly ok: false; readonly reason: MissReason };

/**
 * Pick the edge of `parent` that takes `segment`, without creating anything.
 */
export function selectEdge(parent: Instance, segment: string): EdgeSelection {
    const type = parent.nodeType;

    const fixed = type.staticEdges.get(segment);
    if (fixed !== undefined) {
        const outcome = testEdge(fixed, segment, parent.route);
        return outcome.status === 'matched'
            ? { ok: true, edge: fixed, metadata: outcome.metadata }
            : { ok: false, reason: 'guard' };
    }

    for (const edge of type.dynamicEdges) {
        const outcome = testEdge(edge, segment, parent.route);
        if (outcome.status === 'matched') return { ok: true, edge, metadata: outcome.metadata };
    }
    return { ok: false, reason: 'no-edge' };
}

// ── Resolution ───────────────────────────────────────────

/**
 * Resolve `segment` under `parent`.
 *
 * @param payload - Handed to the child type's init hook
 * @throws {ChildNotFoundError} If no edge takes the segment or the init
 *   hook reports the entity as absent
 */
export function resolve(parent: Instance, segment: string, payload?: unknown): Instance {
    const selection = selectEdge(parent, segment);
    if (!selection.ok) {
        throw miss(parent, segment, selection.reason);
    }
    return instantiate(parent, selection.edge, segment, selection.metadata, payload);
}

/**
 * Non-throwing {@link resolve}: returns `fallback` when the child does not
 * exist. Errors other than {@link ChildNotFoundError} still propagate.
 */
export function tryResolve<T>(parent: Instance, segment: string, fallback: T): Instance | T {
    try {
        return resolve(parent, segment);
    } catch (err) {
        if (err instanceof ChildNotFoundError) return fallback;
        throw err;
    }
}

/**
 * Create a child through the mount named `mountName` (a static literal or
 * a dynamic metaname), for callers that already hold the entity and pass
 * it as `payload`. The guard and the condition still apply. A static
 * literal wins over a metaname of the same name; among dynamic mounts
 * sharing a metaname, the first registered is used.
 *
 * @throws {ChildNotFoundError} If the mount is unknown or rejects `segment`
 */
export function spawn(parent: Instance, mountName: string, segment: string, payload?: unknown): Instance {
    const edge = parent.nodeType.namedEdge(mountName);
    if (edge === undefined) {
        throw miss(parent, mountName, 'no-edge');
    }
    const outcome = testEdge(edge, segment, parent.route);
    if (outcome.status !== 'matched') {
        throw miss(parent, segment, 'guard');
    }
    return instantiate(parent, edge, segment, outcome.metadata, payload);
}

// ── Private helpers ──────────────────────────────────────

function instantiate(
    parent: Instance,
    edge: MountEdge,
    segment: string,
    metadata: Metadata,
    payload: unknown,
): Instance {
    const debug = parent.tree.debug;
    const startTime = debug ? performance.now() : 0;
    const child = parent.adopt(edge, segment, metadata, payload);

    try {
        edge.child.onInit?.(child, payload);
    } catch (err) {
        if (signalsAbsence(edge.child, err)) {
            throw miss(parent, segment, 'not-exist', err);
        }
        debug?.({
            type: 'error',
            path: parent.uri,
            segment,
            error: err instanceof Error ? err.message : String(err),
            timestamp: Date.now(),
        });
        throw err;
    }

    debug?.({
        type: 'resolve',
        path: parent.uri,
        segment,
        nodeType: edge.child.name,
        durationMs: performance.now() - startTime,
        timestamp: Date.now(),
    });
    return child;
}

function signalsAbsence(type: NodeType, err: unknown): boolean {
    return err instanceof NodeNotExistError || type.notExist.some(cls => err instanceof cls);
}

function miss(parent: Instance, segment: string, reason: MissReason, cause?: unknown): ChildNotFoundError {
    parent.tree.debug?.({ type: 'miss', path: parent.uri, segment, reason, timestamp: Date.now() });
    return new ChildNotFoundError(segment, parent.uri, cause !== undefined ? { cause } : {});
}
