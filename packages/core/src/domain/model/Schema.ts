import type { PreProcessor, Validator } from './Validator.js';
import { isValidKey } from './FieldPath.js';
import { allChildren, noop } from '../services/validators.js';
import { identity } from '../services/preProcessors.js';

/** Optional behaviour attached to a schema node. */
export interface SchemaOptions {
  readonly validator?: Validator;
  readonly preProcessor?: PreProcessor;
}

/**
 * Blueprint for one position of the input tree.
 *
 * `validator` and `preProcessor` may be reassigned after construction; the
 * change applies to every later bind, never to trees already bound.
 */
abstract class SchemaNode {
  validator: Validator;
  preProcessor: PreProcessor;

  protected constructor(defaultValidator: Validator, options?: SchemaOptions) {
    this.validator = options?.validator ?? defaultValidator;
    this.preProcessor = options?.preProcessor ?? identity;
  }
}

/** A single datum. Default validator: `noop`. */
export class LeafSchema extends SchemaNode {
  readonly kind = 'leaf' as const;

  constructor(options?: SchemaOptions) {
    super(noop, options);
  }
}

/** Keyed children in declaration order. Default validator: `allChildren`. */
export class MapSchema extends SchemaNode {
  readonly kind = 'map' as const;
  private readonly children: ReadonlyMap<string, Schema>;

  constructor(children: Readonly<Record<string, Schema>> | Iterable<readonly [string, Schema]>, options?: SchemaOptions) {
    super(allChildren, options);
    const entries = isEntryIterable(children) ? [...children] : Object.entries(children);
    for (const [name] of entries) {
      if (!isValidKey(name)) {
        throw new Error(`MapSchema: invalid field name '${name}' (must be non-empty, without '.' or ':', and not '__proto__')`);
      }
    }
    this.children = new Map(entries);
  }

  get(name: string): Schema | undefined {
    return this.children.get(name);
  }

  has(name: string): boolean {
    return this.children.has(name);
  }

  keys(): IterableIterator<string> {
    return this.children.keys();
  }

  entries(): IterableIterator<[string, Schema]> {
    return this.children.entries();
  }

  get size(): number {
    return this.children.size;
  }
}

/** A homogeneous list; `element` is the template for every item. Default validator: `allChildren`. */
export class SequenceSchema extends SchemaNode {
  readonly kind = 'sequence' as const;

  constructor(
    readonly element: Schema,
    options?: SchemaOptions,
  ) {
    super(allChildren, options);
  }
}

export type Schema = LeafSchema | MapSchema | SequenceSchema;

/** Nested literal accepted by `makeSchema`. */
export type SchemaLiteral = Schema | Validator | SchemaLiteralMap | readonly SchemaLiteral[];

export interface SchemaLiteralMap {
  readonly [name: string]: SchemaLiteral;
}

export function isSchema(value: unknown): value is Schema {
  return value instanceof LeafSchema || value instanceof MapSchema || value instanceof SequenceSchema;
}

export function isMapSchema(schema: Schema): schema is MapSchema {
  return schema.kind === 'map';
}

export function isSequenceSchema(schema: Schema): schema is SequenceSchema {
  return schema.kind === 'sequence';
}

export function isLeafSchema(schema: Schema): schema is LeafSchema {
  return schema.kind === 'leaf';
}

/**
 * Build a schema tree from a nested literal.
 *
 * Objects become `MapSchema`, one-element arrays become `SequenceSchema` with
 * that element as template, functions become `LeafSchema` with the function as
 * validator, and schema instances are used as they are.
 *
 * @example
 * ```typescript
 * const schema = makeSchema({
 *   username: fromRegex(/^[a-z]+$/),
 *   tags: [{ name: ensureString }],
 * });
 * ```
 */
export function makeSchema(literal: SchemaLiteral): Schema {
  if (isSchema(literal)) return literal;
  if (typeof literal === 'function') return new LeafSchema({ validator: literal });
  if (isLiteralList(literal)) {
    const [element, ...rest] = literal;
    if (element === undefined || rest.length > 0) {
      throw new Error(`makeSchema: a sequence literal must have exactly one element, got ${String(literal.length)}`);
    }
    return new SequenceSchema(makeSchema(element));
  }
  return new MapSchema(Object.entries(literal).map(([name, child]) => [name, makeSchema(child)] as const));
}

function isLiteralList(literal: SchemaLiteral): literal is readonly SchemaLiteral[] {
  return Array.isArray(literal);
}

function isEntryIterable(
  children: Readonly<Record<string, Schema>> | Iterable<readonly [string, Schema]>,
): children is Iterable<readonly [string, Schema]> {
  return Symbol.iterator in children;
}
