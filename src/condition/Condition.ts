/**
 * Condition — Closed Set of Segment Matchers
 *
 * A condition decides whether one path segment may be mounted at a
 * position of the tree, and extracts metadata from it. Conditions are
 * plain immutable data (a discriminated union on `kind`); combinators
 * compose other conditions instead of subclassing them.
 *
 * | Kind        | Matches                                            |
 * |-------------|----------------------------------------------------|
 * | `literal`   | exactly one string                                 |
 * | `pattern`   | a regular expression (`decimalId`, `hexId`, ...)   |
 * | `and`       | every operand                                      |
 * | `or`        | the first matching operand, in order               |
 * | `not`       | whatever the operand rejects                       |
 * | `under`     | positions below given node types or static names   |
 * | `recursion` | recursive mounts, bounded by depth                 |
 *
 * @example
 * ```typescript
 * // Comments exist below published posts only
 * mountStatic(Post, 'comments', Comments, { complies: not(under('drafts')) });
 *
 * // Numeric ids, except zero
 * mountDynamic(Users, and(decimalId, not(literal('0'))), User, 'user_id');
 * ```
 *
 * @module
 */
import { ConfigurationError } from '../errors.js';
import { type NodeType } from '../domain/NodeType.js';

// ── Variants ─────────────────────────────────────────────

/** Which built-in pattern a {@link PatternCondition} is. */
export type PatternKind = 'decimal' | 'hex' | 'text' | 'any' | 'custom';

export interface LiteralCondition {
    readonly kind: 'literal';
    readonly value: string;
}

export interface PatternCondition {
    readonly kind: 'pattern';
    readonly pattern: PatternKind;
    readonly regex: RegExp;
    /** Explicit metadata key; the edge metaname is used when absent */
    readonly capture?: string;
}

export interface AndCondition {
    readonly kind: 'and';
    readonly conditions: readonly Condition[];
}

export interface OrCondition {
    readonly kind: 'or';
    readonly conditions: readonly Condition[];
}

export interface NotCondition {
    readonly kind: 'not';
    readonly condition: Condition;
}

/** A node type, or the literal of a static mount. */
export type UnderTarget = NodeType | string;

export interface UnderCondition {
    readonly kind: 'under';
    readonly targets: readonly UnderTarget[];
    readonly condition?: Condition;
}

export interface RecursionCondition {
    readonly kind: 'recursion';
    /** Maximum occurrences of the mounted type on a route, root included */
    readonly maxDepth: number;
    readonly condition?: Condition;
    readonly capture?: string;
}

export type Condition =
    | LiteralCondition
    | PatternCondition
    | AndCondition
    | OrCondition
    | NotCondition
    | UnderCondition
    | RecursionCondition;

const CONDITION_KINDS: ReadonlySet<string> = new Set([
    'literal', 'pattern', 'and', 'or', 'not', 'under', 'recursion',
]);

/** Runtime guard for values handed in from untyped callers. */
export function isCondition(value: unknown): value is Condition {
    return typeof value === 'object'
        && value !== null
        && 'kind' in value
        && typeof value.kind === 'string'
        && CONDITION_KINDS.has(value.kind);
}

// ── Built-in patterns ────────────────────────────────────

/** Decimal digits only. Extracts an integer. */
export const decimalId: PatternCondition = Object.freeze({
    kind: 'pattern', pattern: 'decimal', regex: /^\d+$/,
});

/** Hexadecimal digits, either case. Extracts the segment as a string. */
export const hexId: PatternCondition = Object.freeze({
    kind: 'pattern', pattern: 'hex', regex: /^[a-f\d]+$/i,
});

/** A single word: letters, digits, `_` and `-`. */
export const textId: PatternCondition = Object.freeze({
    kind: 'pattern', pattern: 'text', regex: /^[\w-]+$/,
});

/** Every segment. */
export const anyId: PatternCondition = Object.freeze({
    kind: 'pattern', pattern: 'any', regex: /^/,
});

// ── Constructors ─────────────────────────────────────────

export function literal(value: string): LiteralCondition {
    return Object.freeze({ kind: 'literal', value });
}

/**
 * Custom regular expression. Stateful flags (`g`, `y`) are dropped so
 * repeated tests stay independent.
 */
export function pattern(regex: RegExp, options: { capture?: string } = {}): PatternCondition {
    const flags = regex.flags.replace(/[gy]/g, '');
    return Object.freeze({
        kind: 'pattern',
        pattern: 'custom',
        regex: new RegExp(regex.source, flags),
        ...(options.capture !== undefined ? { capture: options.capture } : {}),
    });
}

/** Copy of a pattern or recursion condition capturing under an explicit key. */
export function capture<C extends PatternCondition | RecursionCondition>(key: string, condition: C): C {
    const copy: C = { ...condition, capture: key };
    Object.freeze(copy);
    return copy;
}

/**
 * All operands must match. Their metadata is merged, so their capture
 * keys must be disjoint.
 *
 * @throws {ConfigurationError} If no operand is given or capture keys overlap
 */
export function and(...conditions: Condition[]): AndCondition {
    if (conditions.length === 0) {
        throw new ConfigurationError('and() requires at least one condition.');
    }
    assertDisjointCaptures(conditions, 'and()');
    return Object.freeze({ kind: 'and', conditions: Object.freeze([...conditions]) });
}

/** The first matching operand wins; only its metadata is kept. */
export function or(...conditions: Condition[]): OrCondition {
    if (conditions.length === 0) {
        throw new ConfigurationError('or() requires at least one condition.');
    }
    return Object.freeze({ kind: 'or', conditions: Object.freeze([...conditions]) });
}

export function not(condition: Condition): NotCondition {
    return Object.freeze({ kind: 'not', condition });
}

/**
 * Matches positions whose route passes through one of `targets`: a node
 * type, or the literal of a static mount. The candidate position itself
 * counts. When `condition` is given the segment must also satisfy it.
 */
export function under(targets: UnderTarget | readonly UnderTarget[], condition?: Condition): UnderCondition {
    const list: readonly UnderTarget[] = isTargetList(targets) ? [...targets] : [targets];
    if (list.length === 0) {
        throw new ConfigurationError('under() requires at least one target.');
    }
    return Object.freeze({
        kind: 'under',
        targets: Object.freeze(list),
        ...(condition !== undefined ? { condition } : {}),
    });
}

function isTargetList(targets: UnderTarget | readonly UnderTarget[]): targets is readonly UnderTarget[] {
    return Array.isArray(targets);
}

export interface RecursionOptions {
    /** Segment test applied to every step of the recursive run */
    readonly condition?: Condition;
    /** Occurrences of the mounted type allowed on a route, root included */
    readonly maxDepth?: number;
    readonly capture?: string;
}

/**
 * Marks a mount as recursive: it may close a cycle in the declaration
 * graph. Without `maxDepth` the recursion is unbounded at resolution time
 * and collapsed to one representative route by the enumerator.
 *
 * @throws {ConfigurationError} If `maxDepth` is not a positive integer
 */
export function recursion(options: RecursionOptions = {}): RecursionCondition {
    const maxDepth = options.maxDepth ?? Number.POSITIVE_INFINITY;
    if (maxDepth !== Number.POSITIVE_INFINITY && !(Number.isInteger(maxDepth) && maxDepth > 0)) {
        throw new ConfigurationError(`recursion() maxDepth must be a positive integer, got ${String(maxDepth)}.`);
    }
    return Object.freeze({
        kind: 'recursion',
        maxDepth,
        ...(options.condition !== undefined ? { condition: options.condition } : {}),
        ...(options.capture !== undefined ? { capture: options.capture } : {}),
    });
}

// ── Static analysis ──────────────────────────────────────

/** Stands for "the metaname of the edge the condition is mounted with". */
export const EDGE_METANAME: unique symbol = Symbol('edge-metaname');

export type CaptureKey = string | typeof EDGE_METANAME;

/**
 * Every metadata key a condition can produce.
 */
export function captureKeys(condition: Condition): ReadonlySet<CaptureKey> {
    switch (condition.kind) {
        case 'literal':
        case 'not':
            return new Set();
        case 'pattern':
            return new Set([condition.capture ?? EDGE_METANAME]);
        case 'recursion':
            return condition.condition ? new Set([condition.capture ?? EDGE_METANAME]) : new Set();
        case 'under':
            return condition.condition ? captureKeys(condition.condition) : new Set();
        case 'and':
        case 'or': {
            const keys = new Set<CaptureKey>();
            for (const operand of condition.conditions) {
                for (const key of captureKeys(operand)) keys.add(key);
            }
            return keys;
        }
    }
}

/**
 * @throws {ConfigurationError} If two conditions can write the same key
 */
export function assertDisjointCaptures(conditions: readonly Condition[], subject: string): void {
    const seen = new Set<CaptureKey>();
    for (const condition of conditions) {
        for (const key of captureKeys(condition)) {
            if (seen.has(key)) {
                const label = key === EDGE_METANAME ? 'the edge metaname' : `"${key}"`;
                throw new ConfigurationError(
                    `${subject}: several conditions capture ${label}. ` +
                    `Give them distinct keys with capture().`,
                );
            }
            seen.add(key);
        }
    }
}

/** `true` if the condition sanctions a cycle in the declaration graph. */
export function isRecursive(condition: Condition | undefined): boolean {
    if (condition === undefined) return false;
    if (condition.kind === 'recursion') return true;
    return condition.kind === 'and' && condition.conditions.some(isRecursive);
}

/** `true` if the condition carries a recursion guard with a finite depth. */
export function isBoundedRecursion(condition: Condition | undefined): boolean {
    if (condition === undefined) return false;
    if (condition.kind === 'recursion') return Number.isFinite(condition.maxDepth);
    return condition.kind === 'and' && condition.conditions.some(isBoundedRecursion);
}

const DEFAULT_METANAMES: Readonly<Record<PatternKind, string>> = {
    decimal: 'id',
    hex: 'id',
    text: 'slug',
    any: 'name',
    custom: 'value',
};

/**
 * Metaname used by `mountDynamic()` when none is given, derived from the
 * condition kind (`id` for {@link decimalId}).
 */
export function defaultMetaname(condition: Condition): string {
    switch (condition.kind) {
        case 'pattern':
            return DEFAULT_METANAMES[condition.pattern];
        case 'and':
        case 'or':
            return defaultMetaname(condition.conditions[0]);
        case 'under':
        case 'recursion':
            return condition.condition ? defaultMetaname(condition.condition) : 'name';
        case 'literal':
            return 'name';
        case 'not':
            return 'value';
    }
}
