/**
 * TreeBuilder — Fluent Tree Declaration
 *
 * Declares node types and mounts in one place at start-up, then freezes
 * the result into a {@link ResourceTree}. Each call is validated as it is
 * made, so a bad declaration fails at start-up, never at lookup time.
 *
 * @example
 * ```typescript
 * const builder = new TreeBuilder('Root', { debug: createDebugObserver() });
 * const Users = builder.node('Users');
 * const User = builder.node('User', { onInit: loadUser, notExist: [UserMissing] });
 * const Posts = builder.node('Posts');
 * const Post = builder.node('Post');
 *
 * const tree = builder
 *     .mountStatic(builder.root, 'users', Users)
 *     .mountDynamic(Users, decimalId, User, 'user_id')
 *     .mountStatic(builder.root, 'posts', Posts)
 *     .mountStatic(User, 'posts', Posts)
 *     .mountDynamic(Posts, decimalId, Post, 'post_id')
 *     .build();
 *
 * tree.createRoot().resolvePath(['users', '1', 'posts', '7']); // <Post: /users/1/posts/7/>
 * ```
 *
 * @module
 */
import { type Condition } from '../condition/Condition.js';
import { ConfigurationError } from '../errors.js';
import { type MountEdge, type NodeType, type NodeTypeOptions } from '../domain/NodeType.js';
import { ResourceTree, type TreeOptions } from './ResourceTree.js';
import {
    type DynamicMountOptions, type StaticMountOptions,
    defineNode, mountDynamic, mountStatic,
} from './mount.js';
import { TreeOptionsSchema, parseConfig } from './schemas.js';

export class TreeBuilder {
    /** Root node type of the tree being declared */
    readonly root: NodeType;

    private readonly _options: TreeOptions;
    private readonly _nodes = new Map<string, NodeType>();
    private _tree?: ResourceTree;

    /**
     * @param root - An existing root type, or the name of a new one
     * @param options - Debug observer and tracer for the built tree
     */
    constructor(root: NodeType | string, options: TreeOptions = {}) {
        this._options = parseConfig(TreeOptionsSchema, options, 'TreeBuilder');
        this.root = typeof root === 'string' ? defineNode(root) : root;
        this._nodes.set(this.root.name, this.root);
    }

    /**
     * Declare a node type, or return the one already declared under `name`.
     *
     * @throws {ConfigurationError} If `name` is taken and options are given
     */
    node(name: string, options?: NodeTypeOptions): NodeType {
        const existing = this._nodes.get(name);
        if (existing !== undefined) {
            if (options !== undefined) {
                throw new ConfigurationError(`Node type "${name}" is already declared.`);
            }
            return existing;
        }
        const type = defineNode(name, options);
        this._nodes.set(name, type);
        return type;
    }

    /** @see {@link mountStatic} */
    mountStatic(parent: NodeType, literal: string, child: NodeType, options?: StaticMountOptions): this {
        this._assertNotBuilt();
        this._emitMount(mountStatic(parent, literal, child, options));
        return this;
    }

    /** @see {@link mountDynamic} */
    mountDynamic(
        parent: NodeType,
        condition: Condition,
        child: NodeType,
        options?: string | DynamicMountOptions,
    ): this {
        this._assertNotBuilt();
        this._emitMount(mountDynamic(parent, condition, child, options));
        return this;
    }

    /**
     * Seal the declaration and return the tree. Later calls return the
     * same tree.
     */
    build(): ResourceTree {
        this._tree ??= new ResourceTree(this.root, this._options);
        return this._tree;
    }

    // ── Private ─────────────────────────────────────────

    private _emitMount(edge: MountEdge): void {
        this._options.debug?.({
            type: 'mount',
            parent: edge.parent.name,
            child: edge.child.name,
            edge: edge.kind,
            label: edge.kind === 'static' ? edge.literal : `{${edge.metaname}}`,
            timestamp: Date.now(),
        });
    }

    private _assertNotBuilt(): void {
        if (this._tree !== undefined) {
            throw new ConfigurationError(
                `TreeBuilder for "${this.root.name}" is frozen after build(). ` +
                `Cannot mount into a built tree.`,
            );
        }
    }
}
