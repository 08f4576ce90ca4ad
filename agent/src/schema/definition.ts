/**
 * JSON values exchanged with the model and emitted as schemas.
 */
export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

type Described = {
  readonly description?: string;
};

export interface StringField extends Described {
  readonly kind: 'string';
}

export interface IntegerField extends Described {
  readonly kind: 'integer';
}

export interface NumberField extends Described {
  readonly kind: 'number';
}

export interface BooleanField extends Described {
  readonly kind: 'boolean';
}

export interface ArrayField<Item> extends Described {
  readonly kind: 'array';
  readonly items: Item;
}

/**
 * A field that may be absent. It is left out of the enclosing `required` list.
 */
export interface OptionalField<Inner> extends Described {
  readonly kind: 'optional';
  readonly inner: Inner;
}

/**
 * Reference to another argument type. The thunk lets a type point at itself.
 */
export interface NamedField<Target> extends Described {
  readonly kind: 'named';
  readonly resolve: () => Target;
}

export type FieldType =
  | StringField
  | IntegerField
  | NumberField
  | BooleanField
  | ArrayField<FieldType>
  | OptionalField<FieldType>
  | NamedField<ArgumentType>;

/**
 * Ordered field declarations; property order follows insertion order.
 */
export type FieldShape = { [field: string]: FieldType };

export interface RecordType<Shape> extends Described {
  readonly kind: 'record';
  readonly name: string;
  readonly fields: Shape;
}

export interface UnitVariant extends Described {
  readonly kind: 'unit';
}

export interface ValueVariant<Payload> extends Described {
  readonly kind: 'value';
  readonly payload: Payload;
}

/**
 * Two or more positional payloads, encoded as a fixed-length `value` array.
 */
export interface TupleVariant<Items> extends Described {
  readonly kind: 'tuple';
  readonly items: Items;
}

export interface FieldsVariant<Shape> extends Described {
  readonly kind: 'fields';
  readonly fields: Shape;
}

export type VariantPayload =
  | UnitVariant
  | ValueVariant<FieldType>
  | TupleVariant<readonly FieldType[]>
  | FieldsVariant<FieldShape>;

export type VariantShape = { [variant: string]: VariantPayload };

export interface UnionType<Variants> extends Described {
  readonly kind: 'union';
  readonly name: string;
  readonly variants: Variants;
}

/**
 * Closed description of a tool's input: a record or a tagged union.
 */
export type ArgumentType = RecordType<FieldShape> | UnionType<VariantShape>;

type Simplify<T> = { [K in keyof T]: T[K] } & {};

type OptionalKeys<Shape> = {
  [K in keyof Shape]: Shape[K] extends OptionalField<unknown> ? K : never;
}[keyof Shape];

type RequiredKeys<Shape> = Exclude<keyof Shape, OptionalKeys<Shape>>;

export type InferField<F> = F extends StringField
  ? string
  : F extends IntegerField | NumberField
    ? number
    : F extends BooleanField
      ? boolean
      : F extends ArrayField<infer Item>
        ? InferField<Item>[]
        : F extends OptionalField<infer Inner>
          ? InferField<Inner> | undefined
          : F extends NamedField<infer Target>
            ? InferArgs<Target>
            : never;

export type InferShape<Shape> = Simplify<
  { [K in RequiredKeys<Shape>]: InferField<Shape[K]> } & {
    [K in OptionalKeys<Shape>]?: InferField<Shape[K]>;
  }
>;

type InferVariant<Name, Payload> = Payload extends UnitVariant
  ? { type: Name }
  : Payload extends ValueVariant<infer Value>
    ? { type: Name; value: InferField<Value> }
    : Payload extends TupleVariant<infer Items>
      ? { type: Name; value: { -readonly [I in keyof Items]: InferField<Items[I]> } }
      : Payload extends FieldsVariant<infer Shape>
        ? Simplify<{ type: Name } & InferShape<Shape>>
        : never;

/**
 * Value shape a tool receives once its arguments are decoded.
 */
export type InferArgs<A> = A extends RecordType<infer Shape>
  ? InferShape<Shape>
  : A extends UnionType<infer Variants>
    ? { [K in keyof Variants & string]: InferVariant<K, Variants[K]> }[keyof Variants & string]
    : never;
