import { AgentError, Failures } from '../errors.js';
import type {
  ArgumentType,
  FieldShape,
  FieldType,
  JsonObject,
  JsonValue,
  RecordType,
  UnionType,
  VariantPayload,
  VariantShape,
} from './definition.js';

/**
 * Bookkeeping for one generation pass. Types are tracked by identity;
 * names only serve as `$defs` keys.
 */
type GenerationScope = {
  root: ArgumentType;
  stack: ArgumentType[];
  recursive: Set<ArgumentType>;
  defs: Map<ArgumentType, JsonObject>;
  defNames: Map<string, ArgumentType>;
};

const withDescription = (schema: JsonObject, description?: string): JsonObject => {
  if (!description) {
    return schema;
  }
  return { ...schema, description };
};

/**
 * Generated schemas are shared by every reader of a tool, so they are frozen.
 */
const freezeSchema = (value: JsonValue): void => {
  if (value === null || typeof value !== 'object') {
    return;
  }
  for (const child of Object.values(value)) {
    freezeSchema(child);
  }
  Object.freeze(value);
};

/**
 * `$ref` to the shared definition of `type`. Throws when a different type
 * already holds that name.
 */
const definitionRef = (type: ArgumentType, scope: GenerationScope): JsonObject => {
  const owner = scope.defNames.get(type.name);
  if (owner && owner !== type) {
    throw new AgentError(
      Failures.invalidConfiguration([
        `Recursive type name "${type.name}" is used by more than one type`,
      ]),
    );
  }
  scope.defNames.set(type.name, type);
  return { $ref: `#/$defs/${type.name}` };
};

/**
 * Produces the JSON Schema for an argument type. The result is deeply frozen.
 *
 * Nested argument types are inlined. A reference back to a type that is still
 * being expanded becomes `{"$ref": "#"}` for the root type and
 * `{"$ref": "#/$defs/<Name>"}` for any other type, which is then emitted once
 * under a root-level `$defs`.
 */
export const generateSchema = (type: ArgumentType): JsonObject => {
  const scope: GenerationScope = {
    root: type,
    stack: [],
    recursive: new Set(),
    defs: new Map(),
    defNames: new Map(),
  };

  let schema = describeArgument(type, scope);
  if (scope.defs.size > 0) {
    const defs: JsonObject = {};
    for (const [definedType, definition] of scope.defs) {
      defs[definedType.name] = definition;
    }
    schema = { ...schema, $defs: defs };
  }

  freezeSchema(schema);
  return schema;
};

const describeArgument = (type: ArgumentType, scope: GenerationScope): JsonObject => {
  scope.stack.push(type);
  try {
    return type.kind === 'record'
      ? describeRecord(type, scope)
      : describeUnion(type, scope);
  } finally {
    scope.stack.pop();
  }
};

const describeNamed = (type: ArgumentType, scope: GenerationScope): JsonObject => {
  if (scope.stack.includes(type)) {
    scope.recursive.add(type);
    return type === scope.root ? { $ref: '#' } : definitionRef(type, scope);
  }

  if (scope.defs.has(type)) {
    return definitionRef(type, scope);
  }

  const schema = describeArgument(type, scope);
  if (!scope.recursive.has(type)) {
    return schema;
  }

  scope.defs.set(type, schema);
  return definitionRef(type, scope);
};

const describeField = (field: FieldType, scope: GenerationScope): JsonObject => {
  switch (field.kind) {
    case 'string':
    case 'integer':
    case 'number':
    case 'boolean':
      return withDescription({ type: field.kind }, field.description);
    case 'array':
      return withDescription(
        { type: 'array', items: describeField(field.items, scope) },
        field.description,
      );
    case 'optional': {
      const inner = describeField(field.inner, scope);
      return withDescription(inner, field.description);
    }
    case 'named':
      return withDescription(describeNamed(field.resolve(), scope), field.description);
  }
};

/**
 * Builds `properties` and the names that belong in `required`.
 */
const describeShape = (
  shape: FieldShape,
  scope: GenerationScope,
): { properties: JsonObject; required: string[] } => {
  const properties: JsonObject = {};
  const required: string[] = [];

  for (const [name, field] of Object.entries(shape)) {
    properties[name] = describeField(field, scope);
    if (field.kind !== 'optional') {
      required.push(name);
    }
  }

  return { properties, required };
};

const describeRecord = (type: RecordType<FieldShape>, scope: GenerationScope): JsonObject => {
  const { properties, required } = describeShape(type.fields, scope);
  return withDescription({ type: 'object', properties, required }, type.description);
};

const describeVariant = (
  name: string,
  payload: VariantPayload,
  scope: GenerationScope,
): JsonObject => {
  const properties: JsonObject = { type: { type: 'string', const: name } };
  const required: string[] = ['type'];

  switch (payload.kind) {
    case 'unit':
      break;
    case 'value':
      properties.value = describeField(payload.payload, scope);
      required.push('value');
      break;
    case 'tuple': {
      const items: JsonValue[] = payload.items.map((item) => describeField(item, scope));
      properties.value = {
        type: 'array',
        items,
        minItems: items.length,
        maxItems: items.length,
      };
      required.push('value');
      break;
    }
    case 'fields': {
      // Every named payload field is required, optional ones included.
      const shape = describeShape(payload.fields, scope);
      Object.assign(properties, shape.properties);
      required.push(...Object.keys(payload.fields));
      break;
    }
  }

  return withDescription({ type: 'object', properties, required }, payload.description);
};

const describeUnion = (type: UnionType<VariantShape>, scope: GenerationScope): JsonObject => {
  const oneOf: JsonValue[] = Object.entries(type.variants).map(([name, payload]) =>
    describeVariant(name, payload, scope),
  );
  return withDescription({ oneOf }, type.description);
};
