import { describe, it, expect, vi } from 'vitest';
import { decimalId, hexId, literal, not, or, recursion, under } from '../../src/condition/Condition.js';
import { ChildNotFoundError } from '../../src/errors.js';
import { defineNode, mountDynamic, mountStatic } from '../../src/builder/mount.js';
import { routes } from '../../src/routes/RouteEnumerator.js';
import { blog, categories, folders, usersAndPosts } from '../fixtures/trees.js';

describe('routes()', () => {
    it('should list a single route for a childless root', () => {
        expect(routes(defineNode('Root')).map(String)).toEqual(['/']);
    });

    it('should walk depth-first with static edges by literal, then dynamic edges', () => {
        const { types } = usersAndPosts();
        expect(routes(types.Root).map(String)).toEqual([
            '/',
            '/posts/',
            '/posts/{post_id}/',
            '/users/',
            '/users/{user_id}/',
            '/users/{user_id}/posts/',
            '/users/{user_id}/posts/{post_id}/',
        ]);
    });

    it('should keep dynamic edges in registration order', () => {
        const Items = defineNode('Items');
        mountDynamic(Items, hexId, defineNode('ByHash'), 'hash');
        mountStatic(Items, 'latest', defineNode('Latest'));
        mountDynamic(Items, decimalId, defineNode('ById'), 'item_id');
        expect(routes(Items).map(String)).toEqual(['/', '/latest/', '/{hash}/', '/{item_id}/']);
    });

    it('should expose the terminal type and segments of each route', () => {
        const { types } = usersAndPosts();
        const last = routes(types.Root).at(-1);
        expect(last?.terminal).toBe(types.Post);
        expect(last?.segments).toEqual(['users', '{user_id}', 'posts', '{post_id}']);
        expect(last?.length).toBe(5);
    });

    it('should be deterministic across calls', () => {
        const { tree } = usersAndPosts();
        expect(tree.routes().map(String)).toEqual(tree.routes().map(String));
    });

    describe('guards', () => {
        it('should drop branches a guard rejects', () => {
            const { tree } = blog();
            expect(tree.routes().map(String)).toEqual([
                '/',
                '/drafts/',
                '/drafts/{post_id}/',
                '/posts/',
                '/posts/{post_id}/',
                '/posts/{post_id}/comments/',
            ]);
        });

        it('should reject the same branch at resolution time', () => {
            const { root, types } = blog();
            expect(root.resolvePath(['posts', '2', 'comments']).nodeType).toBe(types.Comments);
            expect(() => root.get('drafts').get('2').get('comments')).toThrow(
                new ChildNotFoundError('comments', '/drafts/2/'),
            );
        });

        it('should keep branches whose guard depends on the segment', () => {
            const Root = defineNode('Root');
            mountDynamic(Root, decimalId, defineNode('Item'), {
                metaname: 'item_id',
                complies: or(under('archive'), not(literal('0'))),
            });
            expect(routes(Root).map(String)).toEqual(['/', '/{item_id}/']);
        });
    });

    describe('recursion', () => {
        it('should expand a bounded recursion up to its depth', () => {
            const { tree } = categories();
            expect(tree.routes().map(String)).toEqual([
                '/',
                '/{category_id}/',
                '/{category_id}/categories/',
                '/{category_id}/categories/{category_id}/',
            ]);
        });

        it('should enforce the same depth at resolution time', () => {
            const { root } = categories();
            const nested = root.resolvePath(['1', 'categories', '2']);
            expect(nested.uri).toBe('/1/categories/2/');
            expect(() => nested.get('categories')).toThrow('Child "categories" not found under /1/categories/2/');
        });

        it('should keep expanding a loop of several types while its bound allows', () => {
            const { tree, root } = categories(3);
            expect(tree.routes().map(String)).toEqual([
                '/',
                '/{category_id}/',
                '/{category_id}/categories/',
                '/{category_id}/categories/{category_id}/',
                '/{category_id}/categories/{category_id}/categories/',
                '/{category_id}/categories/{category_id}/categories/{category_id}/',
            ]);
            expect(root.resolvePath(['1', 'categories', '2', 'categories', '3']).uri)
                .toBe('/1/categories/2/categories/3/');
        });

        it('should collapse an unbounded recursion to one representative route', () => {
            const { tree } = folders();
            expect(tree.routes().map(String)).toEqual(['/', '/{path}/']);
        });

        it('should resolve an unbounded recursion to any depth', () => {
            const { root } = folders();
            const folder = root.resolvePath(['docs', 'drafts', 'old']);
            expect(folder.uri).toBe('/docs/drafts/old/');
            expect(folder.metadata).toEqual({ path: ['docs', 'drafts', 'old'] });
        });

        it('should stop a bounded self-recursion at its depth', () => {
            const { root } = folders(3);
            expect(root.resolvePath(['a', 'b']).metadata).toEqual({ path: ['a', 'b'] });
            expect(() => root.resolvePath(['a', 'b', 'c'])).toThrow(ChildNotFoundError);
        });

        it('should list every route of a bounded self-recursion', () => {
            const { tree } = folders(3);
            expect(tree.routes().map(String)).toEqual(['/', '/{path}/', '/{path}/{path}/']);
        });

        it('should collapse a revisited type reached through a static recursive edge', () => {
            const Node = defineNode('Node');
            const Children = defineNode('Children');
            mountStatic(Node, 'children', Children);
            mountDynamic(Children, decimalId, Node, { metaname: 'node_id', complies: recursion() });
            expect(routes(Node).map(String)).toEqual(['/', '/children/', '/children/{node_id}/']);
        });
    });

    it('should report the enumeration to the debug observer', () => {
        const debug = vi.fn();
        const { types } = usersAndPosts();
        routes(types.Root, { debug });
        expect(debug).toHaveBeenCalledTimes(1);
        expect(debug).toHaveBeenCalledWith(expect.objectContaining({ type: 'enumerate', root: 'Root', routes: 7 }));
    });
});
