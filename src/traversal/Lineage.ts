/**
 * Lineage — Ancestor Chains and Multi-Segment Resolution
 *
 * @module
 */
import { ChildNotFoundError } from '../errors.js';
import { type Instance } from '../domain/Instance.js';
import { type NodeType } from '../domain/NodeType.js';
import { SpanStatusCode } from '../observability/Tracing.js';
import { resolve } from './Resolver.js';

/** Direct parent, `null` for the root. */
export function parentOf(instance: Instance): Instance | null {
    return instance.parent();
}

/**
 * The instance itself, then each ancestor up to the root. Every call
 * returns an independent iterator.
 */
export function* lineage(instance: Instance): Generator<Instance, void, undefined> {
    for (let current: Instance | null = instance; current !== null; current = current.parent()) {
        yield current;
    }
}

/** Criteria for {@link findAncestor}; `name` takes precedence over `type`. */
export interface AncestorQuery {
    readonly name?: string;
    /** A node type, or the name of one */
    readonly type?: NodeType | string;
}

/**
 * First instance in the lineage (the instance itself included) matching
 * `query`. With an empty query, the direct parent.
 */
export function findAncestor(instance: Instance, query: AncestorQuery): Instance | null {
    const { name, type } = query;
    let check: (candidate: Instance) => boolean;
    if (name !== undefined) {
        check = candidate => candidate.name === name;
    } else if (typeof type === 'string') {
        check = candidate => candidate.nodeType.name === type;
    } else if (type !== undefined) {
        check = candidate => candidate.nodeType === type;
    } else {
        return instance.parent();
    }

    for (const candidate of lineage(instance)) {
        if (check(candidate)) return candidate;
    }
    return null;
}

/**
 * Resolve `segments` left to right starting at `start`.
 *
 * Stops at the first missing segment; the thrown error records how many
 * segments were consumed before it. Runs inside one span when the tree
 * has a tracer.
 *
 * @throws {ChildNotFoundError} With `consumed` set on the first miss
 */
export function resolvePath(start: Instance, segments: Iterable<string>): Instance {
    const list = [...segments];
    const span = start.tree.tracer?.startSpan('traversal.resolvePath', {
        attributes: {
            'traversal.path': start.uri,
            'traversal.segments': list.length,
        },
    });

    let current = start;
    let consumed = 0;
    try {
        for (const segment of list) {
            try {
                current = resolve(current, segment);
            } catch (err) {
                if (err instanceof ChildNotFoundError) throw err.withConsumed(consumed);
                throw err;
            }
            consumed++;
        }
        span?.setAttribute('traversal.resolved', current.uri);
        span?.setStatus({ code: SpanStatusCode.OK });
        return current;
    } catch (err) {
        if (span) {
            if (err instanceof ChildNotFoundError) {
                span.setAttribute('traversal.missing', err.segment);
                span.setStatus({ code: SpanStatusCode.UNSET });
            } else {
                const message = err instanceof Error ? err.message : String(err);
                span.recordException(err instanceof Error ? err : message);
                span.setStatus({ code: SpanStatusCode.ERROR, message });
            }
        }
        throw err;
    } finally {
        span?.setAttribute('traversal.consumed', consumed);
        span?.end();
    }
}
