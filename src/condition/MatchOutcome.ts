/**
 * MatchOutcome — Three-Valued Condition Results
 *
 * A condition evaluated against a known segment is either `matched`
 * (carrying the metadata it extracted) or `unmatched`. During route
 * enumeration no segment exists, so segment tests answer `undetermined`
 * and the combinators propagate it with Kleene logic.
 *
 * @example
 * ```typescript
 * const outcome = evaluate(decimalId, { segment: '42', route, metaname: 'user_id' });
 * if (outcome.status === 'matched') {
 *     outcome.metadata.user_id; // 42
 * }
 * ```
 *
 * @module
 */

// ── Metadata ─────────────────────────────────────────────

/** A single extracted value. */
export type MetadataScalar = string | number | bigint;

/** A value stored under a metaname: scalar, or a list from a recursive run. */
export type MetadataValue = MetadataScalar | readonly MetadataScalar[];

/** Values extracted by a condition, keyed by metaname. */
export type Metadata = Readonly<Record<string, MetadataValue>>;

/** Shared empty metadata record. */
export const EMPTY_METADATA: Metadata = Object.freeze({});

// ── Discriminated Union ──────────────────────────────────

export interface Matched {
    readonly status: 'matched';
    readonly metadata: Metadata;
}

export interface Unmatched {
    readonly status: 'unmatched';
}

/** Only produced when the segment is unknown (route enumeration). */
export interface Undetermined {
    readonly status: 'undetermined';
}

export type MatchOutcome = Matched | Unmatched | Undetermined;

// ── Constructors ─────────────────────────────────────────

export function matched(metadata: Metadata = EMPTY_METADATA): Matched {
    return { status: 'matched', metadata };
}

export const UNMATCHED: Unmatched = Object.freeze({ status: 'unmatched' });

export const UNDETERMINED: Undetermined = Object.freeze({ status: 'undetermined' });

// ── Combination ──────────────────────────────────────────

/**
 * Kleene conjunction of two outcomes. Metadata of two matches is merged;
 * keys never overlap because `and()` and the mount functions reject
 * overlapping capture keys at declaration time.
 */
export function conjoin(left: MatchOutcome, right: MatchOutcome): MatchOutcome {
    if (left.status === 'unmatched' || right.status === 'unmatched') return UNMATCHED;
    if (left.status === 'undetermined' || right.status === 'undetermined') return UNDETERMINED;
    if (right.metadata === EMPTY_METADATA) return left;
    if (left.metadata === EMPTY_METADATA) return right;
    return matched({ ...left.metadata, ...right.metadata });
}

/** Kleene negation. A negated match never carries metadata. */
export function negate(outcome: MatchOutcome): MatchOutcome {
    switch (outcome.status) {
        case 'matched': return UNMATCHED;
        case 'unmatched': return matched();
        case 'undetermined': return UNDETERMINED;
    }
}
