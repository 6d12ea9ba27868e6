import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import {
    ChildNotFoundError, ConfigurationError, NodeNotExistError, TraversalError,
} from '../src/errors.js';

describe('errors', () => {
    describe('ChildNotFoundError', () => {
        it('should describe the missing segment', () => {
            const error = new ChildNotFoundError('documents', '/users/1/');
            expect(error).toBeInstanceOf(TraversalError);
            expect(error).toBeInstanceOf(Error);
            expect(error.name).toBe('ChildNotFoundError');
            expect(error.message).toBe('Child "documents" not found under /users/1/');
            expect(error.consumed).toBe(0);
            expect(error.cause).toBeUndefined();
        });

        it('should copy itself with a consumed count, keeping the cause', () => {
            const cause = new NodeNotExistError();
            const error = new ChildNotFoundError('9', '/users/', { cause });
            const annotated = error.withConsumed(1);

            expect(annotated).not.toBe(error);
            expect(annotated.consumed).toBe(1);
            expect(annotated.segment).toBe('9');
            expect(annotated.path).toBe('/users/');
            expect(annotated.cause).toBe(cause);
        });
    });

    describe('ConfigurationError', () => {
        it('should list every zod issue with its field path', () => {
            const schema = z.object({ name: z.string(), depth: z.number().int() });
            const result = schema.safeParse({ name: 1, depth: 1.5 });
            expect(result.success).toBe(false);
            if (result.success) return;

            const error = ConfigurationError.fromZod('defineNode', result.error);
            expect(error.name).toBe('ConfigurationError');
            expect(error.message).toBe(
                '[defineNode] Invalid configuration:\n' +
                "  • 'name': Expected string, received number\n" +
                "  • 'depth': Expected integer, received float",
            );
            expect(error.cause).toBe(result.error);
        });
    });

    describe('NodeNotExistError', () => {
        it('should have a default message', () => {
            const error = new NodeNotExistError();
            expect(error.message).toBe('Node does not exist');
            expect(error.name).toBe('NodeNotExistError');
            expect(new NodeNotExistError('user 7 was deleted').message).toBe('user 7 was deleted');
        });
    });
});
