/**
 * Errors — Traversal Error Taxonomy
 *
 * Three outcomes can leave the core as exceptions:
 *
 * - {@link ChildNotFoundError} — expected and non-fatal. A segment matched
 *   no mount edge, its guard rejected it, or the child's init hook reported
 *   the entity as absent. Hosts translate it into a "not found" response.
 * - {@link ConfigurationError} — raised only while the tree is declared
 *   (duplicate names, unsanctioned cycles, invalid options).
 * - Anything else thrown by an init hook propagates unchanged.
 *
 * @example
 * ```typescript
 * try {
 *     root.resolvePath(['users', '1', 'documents']);
 * } catch (e) {
 *     if (e instanceof ChildNotFoundError) {
 *         console.log(e.segment);  // "documents"
 *         console.log(e.path);     // "/users/1/"
 *         console.log(e.consumed); // 2
 *     }
 * }
 * ```
 *
 * @module
 */
import { type ZodError } from 'zod';

/**
 * Base class of every error raised by the traversal core.
 */
export class TraversalError extends Error {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = 'TraversalError';
    }
}

/** Options accepted by {@link ChildNotFoundError}. */
export interface ChildNotFoundOptions {
    /** Segments consumed before the miss (multi-segment resolution only) */
    readonly consumed?: number;
    /** The init hook error that reported the entity as absent */
    readonly cause?: unknown;
}

/**
 * A segment could not be resolved under the requesting instance.
 */
export class ChildNotFoundError extends TraversalError {
    /** The segment that matched nothing */
    readonly segment: string;
    /** Resolved path of the instance the segment was requested from */
    readonly path: string;
    /** Number of segments resolved before the miss */
    readonly consumed: number;

    constructor(segment: string, path: string, options: ChildNotFoundOptions = {}) {
        super(
            `Child "${segment}" not found under ${path}`,
            options.cause !== undefined ? { cause: options.cause } : undefined,
        );
        this.name = 'ChildNotFoundError';
        this.segment = segment;
        this.path = path;
        this.consumed = options.consumed ?? 0;
    }

    /** Copy of this error annotated with the number of consumed segments. */
    withConsumed(consumed: number): ChildNotFoundError {
        return new ChildNotFoundError(this.segment, this.path, { consumed, cause: this.cause });
    }
}

/**
 * The tree declaration is invalid. Never raised during resolution.
 */
export class ConfigurationError extends TraversalError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = 'ConfigurationError';
    }

    /**
     * Wrap a zod validation failure, listing every offending field.
     *
     * @param subject - What was being configured (e.g. `'mountDynamic(Users)'`)
     */
    static fromZod(subject: string, zodError: ZodError): ConfigurationError {
        const fieldErrors = zodError.issues
            .map(issue => {
                const path = issue.path.length > 0
                    ? `'${issue.path.join('.')}'`
                    : '(root)';
                return `  • ${path}: ${issue.message}`;
            })
            .join('\n');

        return new ConfigurationError(
            `[${subject}] Invalid configuration:\n${fieldErrors}`,
            { cause: zodError },
        );
    }
}

/**
 * Thrown by an init hook to report that the segment names an entity
 * which does not exist. Resolution turns it into {@link ChildNotFoundError}.
 *
 * @example
 * ```typescript
 * const User = defineNode('User', {
 *     onInit(instance) {
 *         if (!users.has(instance.metadata.user_id)) throw new NodeNotExistError();
 *     },
 * });
 * ```
 */
export class NodeNotExistError extends TraversalError {
    constructor(message = 'Node does not exist', options?: ErrorOptions) {
        super(message, options);
        this.name = 'NodeNotExistError';
    }
}
