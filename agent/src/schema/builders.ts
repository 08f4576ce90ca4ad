import { AgentError, Failures } from '../errors.js';
import type {
  ArgumentType,
  ArrayField,
  BooleanField,
  FieldShape,
  FieldType,
  FieldsVariant,
  IntegerField,
  NamedField,
  NumberField,
  OptionalField,
  RecordType,
  StringField,
  TupleVariant,
  UnionType,
  UnitVariant,
  ValueVariant,
  VariantShape,
} from './definition.js';

const TYPE_NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_.-]*$/;

/**
 * Attaches a description only when it carries text.
 */
const described = (description?: string): { description?: string } => {
  const trimmed = description?.trim();
  return trimmed ? { description: trimmed } : {};
};

const isThunk = <T>(value: T | (() => T)): value is () => T => typeof value === 'function';

const assertTypeName = (name: string): void => {
  if (!TYPE_NAME_PATTERN.test(name)) {
    throw new AgentError(
      Failures.invalidConfiguration([`Type name "${name}" must match ${TYPE_NAME_PATTERN.source}`]),
    );
  }
};

/**
 * Field type constructors.
 */
export const t = {
  string: (description?: string): StringField => ({ kind: 'string', ...described(description) }),
  integer: (description?: string): IntegerField => ({ kind: 'integer', ...described(description) }),
  number: (description?: string): NumberField => ({ kind: 'number', ...described(description) }),
  boolean: (description?: string): BooleanField => ({ kind: 'boolean', ...described(description) }),
  array: <Item extends FieldType>(items: Item, description?: string): ArrayField<Item> => ({
    kind: 'array',
    items,
    ...described(description),
  }),
  optional: <Inner extends FieldType>(inner: Inner, description?: string): OptionalField<Inner> => ({
    kind: 'optional',
    inner,
    ...described(description),
  }),
  /**
   * Pass a thunk when the target is declared later or refers back to the
   * type being declared.
   */
  named: <Target extends ArgumentType>(
    target: Target | (() => Target),
    description?: string,
  ): NamedField<Target> => {
    if (isThunk(target)) {
      return { kind: 'named', resolve: target, ...described(description) };
    }
    const value: Target = target;
    return { kind: 'named', resolve: () => value, ...described(description) };
  },
};

/**
 * Variant payload constructors for tagged unions.
 */
export const variant = {
  unit: (description?: string): UnitVariant => ({ kind: 'unit', ...described(description) }),
  value: <Payload extends FieldType>(payload: Payload, description?: string): ValueVariant<Payload> => ({
    kind: 'value',
    payload,
    ...described(description),
  }),
  tuple: <Items extends [FieldType, FieldType, ...FieldType[]]>(
    items: Items,
    description?: string,
  ): TupleVariant<Items> => {
    if (items.length < 2) {
      throw new AgentError(
        Failures.invalidConfiguration(['Tuple variants need at least two payload items']),
      );
    }
    return { kind: 'tuple', items, ...described(description) };
  },
  fields: <Shape extends FieldShape>(fields: Shape, description?: string): FieldsVariant<Shape> => {
    if (Object.prototype.hasOwnProperty.call(fields, 'type')) {
      throw new AgentError(
        Failures.invalidConfiguration(['Variant fields cannot be named "type"; it is the discriminant']),
      );
    }
    return { kind: 'fields', fields, ...described(description) };
  },
};

/**
 * Declares a record argument type with ordered fields.
 */
export const record = <Shape extends FieldShape>(
  name: string,
  fields: Shape,
  description?: string,
): RecordType<Shape> => {
  assertTypeName(name);
  return { kind: 'record', name, fields, ...described(description) };
};

/**
 * Declares a tagged union argument type with ordered variants.
 */
export const union = <Variants extends VariantShape>(
  name: string,
  variants: Variants,
  description?: string,
): UnionType<Variants> => {
  assertTypeName(name);
  if (Object.keys(variants).length === 0) {
    throw new AgentError(
      Failures.invalidConfiguration([`Union "${name}" must declare at least one variant`]),
    );
  }
  return { kind: 'union', name, variants, ...described(description) };
};
