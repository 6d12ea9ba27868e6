/**
 * evaluate() — Condition Evaluation
 *
 * Evaluates a {@link Condition} against the candidate position of the
 * tree. The context carries the segment under test, the route of the
 * candidate (ending with the candidate node) and the metaname of the
 * edge, which is the key of implicit captures.
 *
 * At resolution time the segment is known and every outcome is
 * `matched` or `unmatched`. The route enumerator evaluates with no
 * segment: segment tests answer `undetermined`, while route tests
 * (`under`, the depth limit of `recursion`) still decide.
 *
 * @module
 */
import { type Condition, type PatternCondition, type RecursionCondition, type UnderCondition } from './Condition.js';
import {
    type MatchOutcome, type Metadata, type MetadataScalar,
    EMPTY_METADATA, UNDETERMINED, UNMATCHED, conjoin, matched, negate,
} from './MatchOutcome.js';
import { type Route } from '../domain/Route.js';

export interface MatchContext {
    /** Segment under test; `undefined` while enumerating routes */
    readonly segment: string | undefined;
    /** Route of the candidate; its last node is the candidate itself */
    readonly route: Route;
    /** Key for values captured without an explicit `capture` key */
    readonly metaname: string;
}

export function evaluate(condition: Condition, context: MatchContext): MatchOutcome {
    switch (condition.kind) {
        case 'literal':
            if (context.segment === undefined) return UNDETERMINED;
            return context.segment === condition.value ? matched() : UNMATCHED;

        case 'pattern':
            return evaluatePattern(condition, context);

        case 'and': {
            let outcome: MatchOutcome = matched();
            for (const operand of condition.conditions) {
                outcome = conjoin(outcome, evaluate(operand, context));
                if (outcome.status === 'unmatched') return outcome;
            }
            return outcome;
        }

        case 'or': {
            let undetermined = false;
            for (const operand of condition.conditions) {
                const outcome = evaluate(operand, context);
                if (outcome.status === 'matched') return outcome;
                if (outcome.status === 'undetermined') undetermined = true;
            }
            return undetermined ? UNDETERMINED : UNMATCHED;
        }

        case 'not':
            return negate(evaluate(condition.condition, context));

        case 'under':
            return evaluateUnder(condition, context);

        case 'recursion':
            return evaluateRecursion(condition, context);
    }
}

// ── Patterns ─────────────────────────────────────────────

function evaluatePattern(condition: PatternCondition, context: MatchContext): MatchOutcome {
    const { segment } = context;
    if (segment === undefined) return UNDETERMINED;
    if (!condition.regex.test(segment)) return UNMATCHED;

    const value: MetadataScalar = condition.pattern === 'decimal' ? toInteger(segment) : segment;
    return matched({ [condition.capture ?? context.metaname]: value });
}

/** Digits as a number, or as a bigint past `Number.MAX_SAFE_INTEGER`. */
function toInteger(digits: string): number | bigint {
    const value = Number(digits);
    return Number.isSafeInteger(value) ? value : BigInt(digits);
}

// ── Route conditions ─────────────────────────────────────

function evaluateUnder(condition: UnderCondition, context: MatchContext): MatchOutcome {
    const found = context.route.nodes.some(node =>
        condition.targets.some(target =>
            typeof target === 'string' ? node.literal === target : node.nodeType === target,
        ),
    );
    if (!found) return UNMATCHED;
    return condition.condition ? evaluate(condition.condition, context) : matched();
}

function evaluateRecursion(condition: RecursionCondition, context: MatchContext): MatchOutcome {
    const { route } = context;
    const candidate = route.last;

    let depth = 0;
    for (const node of route) {
        if (node.nodeType === candidate.nodeType) depth++;
    }
    if (depth > condition.maxDepth) return UNMATCHED;

    const step = condition.condition;
    if (step === undefined) return matched();

    const own = evaluate(step, context);
    const { segment } = context;
    if (own.status !== 'matched' || segment === undefined) return own;

    // Collect the run: every node mounted through the same edge, root to leaf.
    const values: MetadataScalar[] = [];
    route.nodes.forEach((node, index) => {
        if (index === route.length - 1) {
            values.push(soleValue(own.metadata, segment));
            return;
        }
        if (node.edge === null || node.edge !== candidate.edge || node.segment === undefined) return;
        const earlier = evaluate(step, {
            segment: node.segment,
            route: route.slice(index + 1),
            metaname: context.metaname,
        });
        values.push(earlier.status === 'matched' ? soleValue(earlier.metadata, node.segment) : node.segment);
    });

    return matched({ [condition.capture ?? context.metaname]: values });
}

/** The only scalar a step extracted, or the raw segment. */
function soleValue(metadata: Metadata, segment: string): MetadataScalar {
    if (metadata === EMPTY_METADATA) return segment;
    const values = Object.values(metadata);
    if (values.length !== 1) return segment;
    const [value] = values;
    return typeof value === 'string' || typeof value === 'number' || typeof value === 'bigint'
        ? value
        : segment;
}
