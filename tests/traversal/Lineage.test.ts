import { describe, it, expect } from 'vitest';
import { ChildNotFoundError } from '../../src/errors.js';
import { findAncestor, lineage, parentOf, resolvePath } from '../../src/traversal/Lineage.js';
import {
    SpanStatusCode,
    type TraversalAttributeValue, type TraversalSpan, type TraversalTracer,
} from '../../src/observability/Tracing.js';
import { usersAndPosts } from '../fixtures/trees.js';

// ── Recording tracer ─────────────────────────────────────

class RecordingSpan implements TraversalSpan {
    readonly attributes = new Map<string, TraversalAttributeValue>();
    readonly exceptions: Array<Error | string> = [];
    status: { code: number; message?: string } | undefined;
    endCount = 0;

    constructor(readonly name: string, initial: Record<string, TraversalAttributeValue> = {}) {
        for (const [key, value] of Object.entries(initial)) this.attributes.set(key, value);
    }

    setAttribute(key: string, value: TraversalAttributeValue): void {
        this.attributes.set(key, value);
    }

    setStatus(status: { code: number; message?: string }): void {
        this.status = status;
    }

    end(): void {
        this.endCount++;
    }

    recordException(exception: Error | string): void {
        this.exceptions.push(exception);
    }
}

class RecordingTracer implements TraversalTracer {
    readonly spans: RecordingSpan[] = [];

    startSpan(name: string, options?: { attributes?: Record<string, TraversalAttributeValue> }): RecordingSpan {
        const span = new RecordingSpan(name, options?.attributes);
        this.spans.push(span);
        return span;
    }
}

// ── Tests ────────────────────────────────────────────────

describe('parentOf()', () => {
    it('should return null for the root', () => {
        const { root } = usersAndPosts();
        expect(parentOf(root)).toBeNull();
    });

    it('should return the direct parent', () => {
        const { root } = usersAndPosts();
        const users = root.get('users');
        expect(parentOf(users.get('1'))).toBe(users);
    });
});

describe('lineage()', () => {
    it('should walk from the instance up to the root', () => {
        const { root } = usersAndPosts();
        const post = root.resolvePath(['users', '1', 'posts', '7']);
        expect([...lineage(post)].map(instance => instance.name)).toEqual(['7', 'posts', '1', 'users', '']);
        expect([...post.lineage()].at(-1)).toBe(root);
    });

    it('should have one entry per level of the declared depth', () => {
        const { root } = usersAndPosts();
        expect([...root.lineage()]).toHaveLength(1);
        expect([...root.resolvePath(['users', '1']).lineage()]).toHaveLength(3);
        expect([...root.resolvePath(['posts', '7']).lineage()]).toHaveLength(3);
    });

    it('should give independent iterators on every call', () => {
        const { root } = usersAndPosts();
        const user = root.resolvePath(['users', '1']);
        const first = user.lineage();
        const second = user.lineage();

        first.next();
        first.next();
        expect(second.next().value).toBe(user);
        expect([...user.lineage()]).toEqual([...user.lineage()]);
    });
});

describe('findAncestor()', () => {
    it('should search by node type or node type name', () => {
        const { root, types } = usersAndPosts();
        const post = root.resolvePath(['users', '1', 'posts', '7']);

        expect(findAncestor(post, { type: types.User })?.uri).toBe('/users/1/');
        expect(post.findAncestor({ type: 'Users' })?.uri).toBe('/users/');
        expect(post.findAncestor({ type: types.Post })).toBe(post);
        expect(post.findAncestor({ type: 'Comments' })).toBeNull();
    });

    it('should search by name before type', () => {
        const { root, types } = usersAndPosts();
        const post = root.resolvePath(['users', '1', 'posts', '7']);

        expect(post.findAncestor({ name: 'users' })?.nodeType).toBe(types.Users);
        expect(post.findAncestor({ name: '', type: types.User })).toBe(post.findAncestor({ type: types.Root }));
        expect(post.findAncestor({ name: 'groups' })).toBeNull();
    });

    it('should return the parent for an empty query', () => {
        const { root } = usersAndPosts();
        const user = root.resolvePath(['users', '1']);
        expect(user.findAncestor({})).toBe(user.parent());
        expect(root.findAncestor({})).toBeNull();
    });
});

describe('resolvePath()', () => {
    it('should resolve every segment in turn', () => {
        const { root, types } = usersAndPosts();

        const user = resolvePath(root, ['users', '1']);
        expect(user.nodeType).toBe(types.User);
        expect(user.name).toBe('1');
        expect(parentOf(user)?.name).toBe('users');

        const post = resolvePath(root, ['users', '1', 'posts', '7']);
        expect(post.nodeType).toBe(types.Post);
        expect(post.name).toBe('7');
        expect(post.metadata).toEqual({ post_id: 7 });
    });

    it('should start from any instance', () => {
        const { root } = usersAndPosts();
        const user = root.resolvePath(['users', '1']);
        expect(user.resolvePath(['posts', '7']).uri).toBe('/users/1/posts/7/');
        expect(user.resolvePath([])).toBe(user);
    });

    it('should report how many segments were consumed before a miss', () => {
        const { root } = usersAndPosts();

        let caught: unknown;
        try {
            root.resolvePath(['users', '1', 'documents', 'x']);
        } catch (err) {
            caught = err;
        }
        expect(caught).toBeInstanceOf(ChildNotFoundError);
        expect(caught).toMatchObject({ segment: 'documents', path: '/users/1/', consumed: 2 });
    });

    it('should report zero consumed segments on a first-segment miss', () => {
        const { root } = usersAndPosts();
        try {
            root.resolvePath(['groups']);
            expect.unreachable();
        } catch (err) {
            expect(err).toMatchObject({ segment: 'groups', path: '/', consumed: 0 });
        }
    });

    it('should accept any iterable of segments', () => {
        const { root } = usersAndPosts();
        const segments = new Set(['users', '1']);
        expect(root.resolvePath(segments).uri).toBe('/users/1/');
    });

    describe('tracing', () => {
        it('should record a successful resolution', () => {
            const tracer = new RecordingTracer();
            const { root } = usersAndPosts({ tracer });

            root.resolvePath(['users', '1']);

            expect(tracer.spans).toHaveLength(1);
            const [span] = tracer.spans;
            expect(span.name).toBe('traversal.resolvePath');
            expect(Object.fromEntries(span.attributes)).toEqual({
                'traversal.path': '/',
                'traversal.segments': 2,
                'traversal.resolved': '/users/1/',
                'traversal.consumed': 2,
            });
            expect(span.status).toEqual({ code: SpanStatusCode.OK });
            expect(span.endCount).toBe(1);
        });

        it('should leave the status unset on a missing child', () => {
            const tracer = new RecordingTracer();
            const { root } = usersAndPosts({ tracer });

            expect(() => root.resolvePath(['users', '1', 'documents'])).toThrow(ChildNotFoundError);

            const [span] = tracer.spans;
            expect(span.attributes.get('traversal.missing')).toBe('documents');
            expect(span.attributes.get('traversal.consumed')).toBe(2);
            expect(span.status).toEqual({ code: SpanStatusCode.UNSET });
            expect(span.exceptions).toEqual([]);
            expect(span.endCount).toBe(1);
        });

        it('should record init hook failures as errors', () => {
            const tracer = new RecordingTracer();
            const failure = new Error('store unavailable');
            const { root } = usersAndPosts({ tracer }, {
                user: {
                    onInit() {
                        throw failure;
                    },
                },
            });

            expect(() => root.resolvePath(['users', '1'])).toThrow(failure);

            const [span] = tracer.spans;
            expect(span.exceptions).toEqual([failure]);
            expect(span.status).toEqual({ code: SpanStatusCode.ERROR, message: 'store unavailable' });
            expect(span.attributes.get('traversal.consumed')).toBe(1);
            expect(span.endCount).toBe(1);
        });

        it('should open one span per call, not per segment', () => {
            const tracer = new RecordingTracer();
            const { root } = usersAndPosts({ tracer });
            root.get('users').get('1');
            expect(tracer.spans).toHaveLength(0);
        });
    });
});
