import { z, type ZodIssue, type ZodTypeAny } from 'zod';
import type { ValidationResult } from '../types.js';
import type {
  ArgumentType,
  FieldShape,
  FieldType,
  InferArgs,
  RecordType,
  UnionType,
  VariantPayload,
  VariantShape,
} from './definition.js';

/**
 * Decoders compiled during one pass, keyed by type identity so recursive
 * references resolve to a lazy schema instead of recompiling forever.
 */
type DecoderScope = Map<ArgumentType, ZodTypeAny>;

const compiledDecoders = new WeakMap<ArgumentType, ZodTypeAny>();

const isPlainObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * Renders zod issues as `path: message` lines.
 */
export const formatIssues = (issues: readonly ZodIssue[]): string[] =>
  issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
  );

/**
 * Compiles an argument type into a zod schema. Results are cached per type.
 */
export const compileDecoder = (type: ArgumentType): ZodTypeAny => {
  const cached = compiledDecoders.get(type);
  if (cached) {
    return cached;
  }

  const compiled = compileArgument(type, new Map());
  compiledDecoders.set(type, compiled);
  return compiled;
};

/**
 * Validates an untyped value against an argument type.
 */
export const decodeArguments = <A extends ArgumentType>(
  type: A,
  input: unknown,
): ValidationResult<InferArgs<A>, string[]> => {
  const parsed = compileDecoder(type).safeParse(input);
  if (!parsed.success) {
    return { ok: false, error: formatIssues(parsed.error.issues) };
  }
  return { ok: true, value: parsed.data };
};

const compileArgument = (type: ArgumentType, scope: DecoderScope): ZodTypeAny => {
  const existing = scope.get(type);
  if (existing) {
    return existing;
  }

  let compiled: ZodTypeAny | undefined;
  scope.set(type, z.lazy(() => compiled ?? z.never()));
  compiled = type.kind === 'record'
    ? compileRecord(type, scope)
    : compileUnion(type, scope);
  return compiled;
};

const compileField = (field: FieldType, scope: DecoderScope): ZodTypeAny => {
  switch (field.kind) {
    case 'string':
      return z.string();
    case 'integer':
      return z.number().int();
    case 'number':
      return z.number();
    case 'boolean':
      return z.boolean();
    case 'array':
      return z.array(compileField(field.items, scope));
    case 'optional':
      // Models often send null for fields they leave empty.
      return compileField(field.inner, scope)
        .nullish()
        .transform((value) => value ?? undefined);
    case 'named':
      return compileArgument(field.resolve(), scope);
  }
};

const compileShape = (shape: FieldShape, scope: DecoderScope): Record<string, ZodTypeAny> => {
  const entries: Record<string, ZodTypeAny> = {};
  for (const [name, field] of Object.entries(shape)) {
    entries[name] = compileField(field, scope);
  }
  return entries;
};

const compileRecord = (type: RecordType<FieldShape>, scope: DecoderScope): ZodTypeAny =>
  z.object(compileShape(type.fields, scope));

const compileVariant = (
  name: string,
  payload: VariantPayload,
  scope: DecoderScope,
): ZodTypeAny => {
  const discriminant = z.literal(name);

  switch (payload.kind) {
    case 'unit':
      return z.object({ type: discriminant });
    case 'value':
      return z.object({ type: discriminant, value: compileField(payload.payload, scope) });
    case 'tuple': {
      const [first, ...rest] = payload.items.map((item) => compileField(item, scope));
      if (!first) {
        return z.never();
      }
      return z.object({ type: discriminant, value: z.tuple([first, ...rest]) });
    }
    case 'fields':
      return z.object({ type: discriminant, ...compileShape(payload.fields, scope) });
  }
};

/**
 * Dispatches on the `type` discriminant so errors point at the chosen variant.
 */
const compileUnion = (type: UnionType<VariantShape>, scope: DecoderScope): ZodTypeAny => {
  const variants = new Map<string, ZodTypeAny>();
  for (const [name, payload] of Object.entries(type.variants)) {
    variants.set(name, compileVariant(name, payload, scope));
  }
  const expected = [...variants.keys()].join(', ');

  return z.unknown().transform((input, ctx) => {
    const variantName = isPlainObject(input) ? input.type : undefined;
    if (typeof variantName !== 'string') {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Expected an object with a "type" of ${expected}`,
      });
      return z.NEVER;
    }

    const schema = variants.get(variantName);
    if (!schema) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['type'],
        message: `Unknown variant "${variantName}"; expected one of ${expected}`,
      });
      return z.NEVER;
    }

    const parsed = schema.safeParse(input);
    if (!parsed.success) {
      for (const issue of parsed.error.issues) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: issue.path, message: issue.message });
      }
      return z.NEVER;
    }
    return parsed.data;
  });
};
