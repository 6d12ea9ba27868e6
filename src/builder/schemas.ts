/**
 * Declaration-time validation of builder options.
 *
 * Declarations may come from untyped code (plain JavaScript, config
 * loaded at start-up), so every public entry point of the builder
 * parses its options here. Failures surface as {@link ConfigurationError}.
 *
 * @module
 */
import { z, type ZodType, type ZodTypeDef } from 'zod';
import { isCondition, type Condition } from '../condition/Condition.js';
import { ConfigurationError } from '../errors.js';
import { type DebugObserverFn } from '../observability/DebugObserver.js';
import { type TraversalTracer } from '../observability/Tracing.js';
import { type ErrorClass, type InitHook } from '../domain/NodeType.js';

// ── Primitives ───────────────────────────────────────────

export const NodeNameSchema = z.string().min(1, 'Node type name must not be empty');

export const LiteralSchema = z.string()
    .min(1, 'Static mount name must not be empty')
    .refine(value => !value.includes('/'), 'Static mount name must not contain "/"');

export const MetanameSchema = z.string()
    .regex(/^[A-Za-z_][A-Za-z0-9_]*$/, 'Metaname must be an identifier (letters, digits, "_")');

const ConditionSchema = z.custom<Condition>(isCondition, 'Expected a condition');

function isFunction(value: unknown): boolean {
    return typeof value === 'function';
}

// ── Option objects ───────────────────────────────────────

export const NodeTypeOptionsSchema = z.object({
    description: z.string().optional(),
    onInit: z.custom<InitHook>(isFunction, 'onInit must be a function').optional(),
    notExist: z.array(z.custom<ErrorClass>(isFunction, 'notExist entries must be error classes')).optional(),
}).strict();

export const StaticMountOptionsSchema = z.object({
    complies: ConditionSchema.optional(),
}).strict();

export const DynamicMountOptionsSchema = z.object({
    metaname: MetanameSchema.optional(),
    complies: ConditionSchema.optional(),
}).strict();

export const TreeOptionsSchema = z.object({
    debug: z.custom<DebugObserverFn>(isFunction, 'debug must be a function').optional(),
    tracer: z.custom<TraversalTracer>(
        value => typeof value === 'object'
            && value !== null
            && 'startSpan' in value
            && typeof value.startSpan === 'function',
        'tracer must provide startSpan()',
    ).optional(),
}).strict();

// ── Parsing ──────────────────────────────────────────────

/**
 * Parse `value` or throw a {@link ConfigurationError} naming `subject`.
 */
export function parseConfig<T>(schema: ZodType<T, ZodTypeDef, unknown>, value: unknown, subject: string): T {
    const result = schema.safeParse(value);
    if (!result.success) {
        throw ConfigurationError.fromZod(subject, result.error);
    }
    return result.data;
}
