import { describe, expect, it } from 'vitest';
import { AgentError } from '../errors.js';
import { record, t, union, variant } from './builders.js';
import type { ArgumentType } from './definition.js';
import { generateSchema } from './generator.js';

const Point = record(
  'Point',
  {
    x: t.integer('Horizontal position'),
    y: t.integer(),
    label: t.optional(t.string()),
  },
  'A point on the grid',
);

const Shape = union('Shape', {
  Unit: variant.unit('Nothing to draw'),
  Single: variant.value(t.string()),
  Multiple: variant.tuple([t.integer(), t.boolean()]),
  Named: variant.fields({ a: t.string(), b: t.optional(t.number()) }),
});

const TreeNode: ArgumentType = record('TreeNode', {
  value: t.string(),
  children: t.array(t.named(() => TreeNode)),
});

const Section: ArgumentType = record('Section', {
  title: t.string(),
  subsections: t.array(t.named(() => Section)),
});

const Outline = record('Outline', { root: t.named(() => Section) });

describe('generateSchema', () => {
  it('describes records with required non-optional fields', () => {
    expect(generateSchema(Point)).toEqual({
      type: 'object',
      description: 'A point on the grid',
      properties: {
        x: { type: 'integer', description: 'Horizontal position' },
        y: { type: 'integer' },
        label: { type: 'string' },
      },
      required: ['x', 'y'],
    });
  });

  it('keeps declaration order in properties and required', () => {
    const schema = generateSchema(record('Ordered', { z: t.string(), a: t.string(), m: t.boolean() }));
    expect(Object.keys(schema.properties ?? {})).toEqual(['z', 'a', 'm']);
    expect(schema.required).toEqual(['z', 'a', 'm']);
  });

  it('describes each union variant in declaration order', () => {
    expect(generateSchema(Shape)).toEqual({
      oneOf: [
        {
          type: 'object',
          description: 'Nothing to draw',
          properties: { type: { type: 'string', const: 'Unit' } },
          required: ['type'],
        },
        {
          type: 'object',
          properties: {
            type: { type: 'string', const: 'Single' },
            value: { type: 'string' },
          },
          required: ['type', 'value'],
        },
        {
          type: 'object',
          properties: {
            type: { type: 'string', const: 'Multiple' },
            value: {
              type: 'array',
              items: [{ type: 'integer' }, { type: 'boolean' }],
              minItems: 2,
              maxItems: 2,
            },
          },
          required: ['type', 'value'],
        },
        {
          type: 'object',
          properties: {
            type: { type: 'string', const: 'Named' },
            a: { type: 'string' },
            b: { type: 'number' },
          },
          required: ['type', 'a', 'b'],
        },
      ],
    });
  });

  it('inlines nested named types and lets the field description win', () => {
    const Wrapper = record('Wrapper', {
      origin: t.named(Point, 'Where to start'),
      tags: t.array(t.string(), 'Free-form tags'),
    });

    expect(generateSchema(Wrapper)).toEqual({
      type: 'object',
      properties: {
        origin: {
          type: 'object',
          description: 'Where to start',
          properties: {
            x: { type: 'integer', description: 'Horizontal position' },
            y: { type: 'integer' },
            label: { type: 'string' },
          },
          required: ['x', 'y'],
        },
        tags: { type: 'array', items: { type: 'string' }, description: 'Free-form tags' },
      },
      required: ['origin', 'tags'],
    });
  });

  it('drops blank descriptions', () => {
    expect(generateSchema(record('Blank', { a: t.string('   ') }, ''))).toEqual({
      type: 'object',
      properties: { a: { type: 'string' } },
      required: ['a'],
    });
  });

  it('references the root type for self-recursion', () => {
    expect(generateSchema(TreeNode)).toEqual({
      type: 'object',
      properties: {
        value: { type: 'string' },
        children: { type: 'array', items: { $ref: '#' } },
      },
      required: ['value', 'children'],
    });
  });

  it('moves recursive nested types into $defs', () => {
    expect(generateSchema(Outline)).toEqual({
      type: 'object',
      properties: {
        root: { $ref: '#/$defs/Section' },
      },
      required: ['root'],
      $defs: {
        Section: {
          type: 'object',
          properties: {
            title: { type: 'string' },
            subsections: { type: 'array', items: { $ref: '#/$defs/Section' } },
          },
          required: ['title', 'subsections'],
        },
      },
    });
  });

  it('is deterministic', () => {
    expect(generateSchema(Shape)).toEqual(generateSchema(Shape));
    expect(JSON.stringify(generateSchema(Outline))).toBe(JSON.stringify(generateSchema(Outline)));
  });

  it('tells apart distinct types that share a name', () => {
    const Root = record('Root', {
      a: t.named(record('Options', { verbose: t.boolean() })),
      b: t.named(record('Options', { depth: t.integer() })),
    });

    expect(generateSchema(Root)).toEqual({
      type: 'object',
      properties: {
        a: { type: 'object', properties: { verbose: { type: 'boolean' } }, required: ['verbose'] },
        b: { type: 'object', properties: { depth: { type: 'integer' } }, required: ['depth'] },
      },
      required: ['a', 'b'],
    });
  });

  it('inlines a nested type named like the root', () => {
    const Thing = record('Thing', { inner: t.named(record('Thing', { x: t.string() })) });

    expect(generateSchema(Thing)).toEqual({
      type: 'object',
      properties: {
        inner: { type: 'object', properties: { x: { type: 'string' } }, required: ['x'] },
      },
      required: ['inner'],
    });
  });

  it('emits one definition for a recursive type used twice', () => {
    const Pair = record('Pair', { left: t.named(Section), right: t.named(Section) });
    const schema = generateSchema(Pair);

    expect(schema.properties).toEqual({
      left: { $ref: '#/$defs/Section' },
      right: { $ref: '#/$defs/Section' },
    });
    expect(Object.keys(schema.$defs ?? {})).toEqual(['Section']);
  });

  it('rejects distinct recursive types competing for one definition name', () => {
    const Chain: ArgumentType = record('Node', { next: t.optional(t.named(() => Chain)) });
    const Tree: ArgumentType = record('Node', { children: t.array(t.named(() => Tree)) });
    const Pair = record('Pair', { left: t.named(Chain), right: t.named(Tree) });

    expect(() => generateSchema(Pair)).toThrow(AgentError);
    expect(() => generateSchema(Pair)).toThrow('Recursive type name "Node" is used by more than one type');
  });

  it('returns a deeply frozen schema', () => {
    const schema = generateSchema(Outline);

    expect(Object.isFrozen(schema)).toBe(true);
    expect(Object.isFrozen(schema.properties)).toBe(true);
    expect(Object.isFrozen(schema.$defs)).toBe(true);
  });
});
