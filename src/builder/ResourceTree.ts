import { EMPTY_METADATA } from '../condition/MatchOutcome.js';
import { Instance } from '../domain/Instance.js';
import { type NodeType } from '../domain/NodeType.js';
import { type Route } from '../domain/Route.js';
import { type DebugObserverFn } from '../observability/DebugObserver.js';
import { type TraversalTracer } from '../observability/Tracing.js';
import { routes } from '../routes/RouteEnumerator.js';
import { sealTree } from './mount.js';
import { TreeOptionsSchema, parseConfig } from './schemas.js';

/** Runtime settings shared by every instance of a tree. */
export interface TreeOptions {
    /** Receives mount, resolve, miss, error and enumerate events */
    readonly debug?: DebugObserverFn;
    /** Wraps every `resolvePath()` call in a span */
    readonly tracer?: TraversalTracer;
}

/**
 * A sealed tree declaration: the entry point for lookups.
 *
 * Constructing it seals every node type reachable from `root`, so the
 * declaration can no longer change once instances exist.
 *
 * @example
 * ```typescript
 * const tree = new ResourceTree(Root, { debug: createDebugObserver() });
 *
 * const root = tree.createRoot();
 * root.resolvePath(['users', '1']);  // <User: /users/1/>
 * tree.routes().map(String);         // ['/', '/users/', '/users/{user_id}/']
 * ```
 */
export class ResourceTree {
    readonly root: NodeType;
    readonly debug: DebugObserverFn | undefined;
    readonly tracer: TraversalTracer | undefined;

    constructor(root: NodeType, options: TreeOptions = {}) {
        const parsed = parseConfig(TreeOptionsSchema, options, `ResourceTree(${root.name})`);
        this.root = root;
        this.debug = parsed.debug;
        this.tracer = parsed.tracer;
        sealTree(root);
    }

    /**
     * Create the root instance. The root type's init hook receives
     * `payload`; its errors propagate unchanged.
     */
    createRoot(payload?: unknown): Instance {
        const instance = new Instance({
            tree: this,
            nodeType: this.root,
            name: '',
            parent: null,
            edge: null,
            metadata: EMPTY_METADATA,
            payload,
        });
        this.root.onInit?.(instance, payload);
        return instance;
    }

    /** Every route template of the tree. */
    routes(): Route[] {
        return routes(this.root, { debug: this.debug });
    }
}
