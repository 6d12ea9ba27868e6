/** Observability — Barrel Export */
export { createDebugObserver } from './DebugObserver.js';
export type {
    DebugObserverFn, TraversalEvent, MissReason,
    MountEvent, ResolveEvent, MissEvent, ErrorEvent, EnumerateEvent,
} from './DebugObserver.js';
export { SpanStatusCode } from './Tracing.js';
export type { TraversalTracer, TraversalSpan, TraversalAttributeValue } from './Tracing.js';
