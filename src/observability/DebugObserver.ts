/**
 * DebugObserver — Opt-in Traversal Logging
 *
 * Structured, typed events emitted while a tree is declared, traversed
 * and enumerated. Nothing is emitted unless an observer is attached,
 * either to a {@link TreeBuilder} or to `routes()`.
 *
 * @example
 * ```typescript
 * import { createDebugObserver, TreeBuilder } from 'resource-traversal';
 *
 * // Default: compact console.debug output
 * const debug = createDebugObserver();
 *
 * // Custom handler (e.g. forward to a structured logger)
 * const debug = createDebugObserver((event) => {
 *     logger.debug(event, event.type);
 * });
 *
 * const tree = new TreeBuilder(Root, { debug }).build();
 * ```
 *
 * @module
 */

// ============================================================================
// Event Types (Discriminated Union)
// ============================================================================

/** Emitted when a child type is mounted through a {@link TreeBuilder}. */
export interface MountEvent {
    readonly type: 'mount';
    readonly parent: string;
    readonly child: string;
    readonly edge: 'static' | 'dynamic';
    /** Literal of a static mount, `{metaname}` of a dynamic one */
    readonly label: string;
    readonly timestamp: number;
}

/** Emitted after a segment resolved into a child instance. */
export interface ResolveEvent {
    readonly type: 'resolve';
    /** Path of the requesting instance */
    readonly path: string;
    readonly segment: string;
    /** Node type of the new child */
    readonly nodeType: string;
    readonly durationMs: number;
    readonly timestamp: number;
}

/**
 * Why a segment did not resolve.
 *
 * - `no-edge` — no static literal and no dynamic condition matched
 * - `guard` — a mount matched but its `complies` guard rejected the route
 * - `not-exist` — the child's init hook reported the entity as absent
 */
export type MissReason = 'no-edge' | 'guard' | 'not-exist';

/** Emitted when a segment does not resolve (a `ChildNotFoundError`). */
export interface MissEvent {
    readonly type: 'miss';
    readonly path: string;
    readonly segment: string;
    readonly reason: MissReason;
    readonly timestamp: number;
}

/** Emitted when an init hook fails with anything but "absent". */
export interface ErrorEvent {
    readonly type: 'error';
    readonly path: string;
    readonly segment: string;
    readonly error: string;
    readonly timestamp: number;
}

/** Emitted after `routes()` walked a declared tree. */
export interface EnumerateEvent {
    readonly type: 'enumerate';
    readonly root: string;
    /** Number of routes produced */
    readonly routes: number;
    readonly durationMs: number;
    readonly timestamp: number;
}

/**
 * Union of all debug event types. Switch on `event.type` for
 * exhaustive handling.
 */
export type TraversalEvent =
    | MountEvent
    | ResolveEvent
    | MissEvent
    | ErrorEvent
    | EnumerateEvent;

/** Observer function that receives debug events. */
export type DebugObserverFn = (event: TraversalEvent) => void;

// ============================================================================
// Factory
// ============================================================================

/**
 * Create a debug observer.
 *
 * If a custom handler is provided, events are forwarded to it instead.
 * The default handler writes one line per event:
 *
 * ```
 * [traversal] mount     Users -> {user_id} -> User
 * [traversal] resolve   /users/ + 1 -> User 0.1ms
 * [traversal] miss      /users/1/ + documents (no-edge)
 * [traversal] routes    Root 7 routes 0.2ms
 * ```
 *
 * @param handler - Optional custom event handler. If omitted, uses `console.debug`.
 */
export function createDebugObserver(handler?: DebugObserverFn): DebugObserverFn {
    if (handler) return handler;

    return (event: TraversalEvent): void => {
        const prefix = '[traversal]';

        switch (event.type) {
            case 'mount':
                console.debug(`${prefix} mount     ${event.parent} -> ${event.label} -> ${event.child}`);
                break;

            case 'resolve':
                console.debug(
                    `${prefix} resolve   ${event.path} + ${event.segment} -> ${event.nodeType} ${event.durationMs.toFixed(1)}ms`,
                );
                break;

            case 'miss':
                console.debug(`${prefix} miss      ${event.path} + ${event.segment} (${event.reason})`);
                break;

            case 'error':
                console.debug(`${prefix} ERROR     ${event.path} + ${event.segment} ${event.error}`);
                break;

            case 'enumerate':
                console.debug(
                    `${prefix} routes    ${event.root} ${event.routes} routes ${event.durationMs.toFixed(1)}ms`,
                );
                break;
        }
    };
}
