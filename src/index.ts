/**
 * Resource Traversal — Root Barrel Export
 *
 * Public API entry point. Aggregates all modules into a single flat
 * namespace for consumers.
 *
 * Architecture:
 *   src/
 *   ├── condition/     ← Segment matchers and their evaluation
 *   ├── domain/        ← NodeType, Route, Instance
 *   ├── builder/       ← Mount table, TreeBuilder, ResourceTree
 *   ├── traversal/     ← Resolver, Lineage
 *   ├── routes/        ← Static route enumeration
 *   └── observability/ ← Debug Observer, Tracing
 */

// ── Errors ───────────────────────────────────────────────
/** @category Errors */
export {
    TraversalError, ChildNotFoundError, ConfigurationError, NodeNotExistError,
    type ChildNotFoundOptions,
} from './errors.js';

// ── Conditions ───────────────────────────────────────────
/** @category Conditions */
export * from './condition/index.js';

// ── Domain ───────────────────────────────────────────────
/** @category Domain */
export * from './domain/index.js';

// ── Builder ──────────────────────────────────────────────
/** @category Builder */
export {
    defineNode, mountStatic, mountDynamic, sealTree,
    type StaticMountOptions, type DynamicMountOptions,
} from './builder/mount.js';
/** @category Builder */
export { TreeBuilder } from './builder/TreeBuilder.js';
/** @category Builder */
export { ResourceTree, type TreeOptions } from './builder/ResourceTree.js';

// ── Traversal ────────────────────────────────────────────
/** @category Traversal */
export { resolve, tryResolve, spawn, selectEdge, type EdgeSelection } from './traversal/Resolver.js';
/** @category Traversal */
export { parentOf, lineage, findAncestor, resolvePath, type AncestorQuery } from './traversal/Lineage.js';

// ── Routes ───────────────────────────────────────────────
/** @category Routes */
export { routes, type RoutesOptions } from './routes/RouteEnumerator.js';

// ── Observability ────────────────────────────────────────
/** @category Observability */
export * from './observability/index.js';
