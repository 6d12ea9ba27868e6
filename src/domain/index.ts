/** Domain Layer — Barrel Export */
export { NodeType, edgeName, isRecursiveEdge, isBoundedEdge } from './NodeType.js';
export type {
    NodeTypeOptions, InitHook, ErrorClass,
    MountEdge, StaticEdge, DynamicEdge,
} from './NodeType.js';
export { Route, rootNode, edgeNode } from './Route.js';
export type { RouteNode } from './Route.js';
export { Instance } from './Instance.js';
export type { InstanceInit } from './Instance.js';
