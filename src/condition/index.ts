/** Condition Engine — Barrel Export */
export {
    literal, pattern, capture, and, or, not, under, recursion,
    decimalId, hexId, textId, anyId,
    isCondition, captureKeys, assertDisjointCaptures,
    isRecursive, isBoundedRecursion, defaultMetaname,
    EDGE_METANAME,
} from './Condition.js';
export type {
    Condition, PatternKind, CaptureKey, UnderTarget, RecursionOptions,
    LiteralCondition, PatternCondition, AndCondition, OrCondition,
    NotCondition, UnderCondition, RecursionCondition,
} from './Condition.js';
export { evaluate } from './evaluate.js';
export type { MatchContext } from './evaluate.js';
export {
    matched, conjoin, negate, UNMATCHED, UNDETERMINED, EMPTY_METADATA,
} from './MatchOutcome.js';
export type {
    MatchOutcome, Matched, Unmatched, Undetermined,
    Metadata, MetadataValue, MetadataScalar,
} from './MatchOutcome.js';
