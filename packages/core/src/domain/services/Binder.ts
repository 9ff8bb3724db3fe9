import type { Schema } from '../model/Schema.js';
import type { FieldName } from '../model/Validator.js';
import type { EventBus } from '../../application/EventBus.js';
import type { TreeEvent } from '../events/DomainEvents.js';
import {
  BoundLeaf,
  BoundMap,
  BoundSequence,
  type AnyBoundField,
  type FieldSettings,
} from '../model/BoundField.js';
import { childPath, indexSegment, keySegment, parsePath, type PathSegment } from '../model/FieldPath.js';
import { formatMessage, type MessageRenderer } from './MessageRenderer.js';
import { isRecord, ownValue } from '../../utils/isRecord.js';

/** Default highest sequence index accepted from flat input. */
export const DEFAULT_MAX_SEQUENCE_INDEX = 1000;

/** Options for binding input to a schema. */
export interface BindOptions {
  /** Renders error templates when a field's `error` is read. Default: `formatMessage`. */
  readonly renderMessage?: MessageRenderer;
  /** Receives `tree:bound`, `field:validated`, `field:failed` and `tree:validated` events. */
  readonly events?: EventBus<TreeEvent>;
  /**
   * Flat input only: keys with a larger sequence index are ignored, so a single
   * key cannot make the binder allocate an arbitrarily long sequence. Default: `1000`.
   */
  readonly maxSequenceIndex?: number;
  /** Flat input only: keep `''` values instead of treating them as missing. Default: `false`. */
  readonly keepEmptyStrings?: boolean;
}

/** Flat input: a plain object, `URLSearchParams`, a `Map` or any iterable of key/value pairs. */
export type FlatInput = Readonly<Record<string, unknown>> | Iterable<readonly [string, unknown]>;

/**
 * Bind nested input (objects, arrays and scalars mirroring the schema) to a schema.
 *
 * Never throws for unexpected input: a mapping or sequence position holding the
 * wrong shape is bound with `rawData` `undefined`, and its own validator decides
 * what that means. Errors thrown by pre-processors propagate.
 */
export function bind(schema: Schema, data: unknown, options?: BindOptions): AnyBoundField {
  const settings: FieldSettings = {
    renderMessage: options?.renderMessage ?? formatMessage,
    events: options?.events,
  };
  const root = buildField(schema, data, '', '', undefined, settings);
  settings.events?.emit({ type: 'tree:bound', fieldCount: countFields(root), timestamp: Date.now() });
  return root;
}

/**
 * Bind flat input keyed by full names (`address.street`, `tags:0.name`).
 *
 * `extra` (e.g. file uploads keyed the same way) is merged over `data`.
 * Empty strings are dropped after merging unless `keepEmptyStrings` is set,
 * so an empty value in `extra` clears the key rather than falling back to `data`.
 */
export function bindFlat(schema: Schema, data: FlatInput, extra?: FlatInput, options?: BindOptions): AnyBoundField {
  const merged = new Map<string, unknown>();
  for (const source of extra === undefined ? [data] : [data, extra]) {
    for (const [key, value] of entriesOf(source)) {
      merged.set(key, value);
    }
  }
  if (options?.keepEmptyStrings !== true) {
    for (const [key, value] of merged) {
      if (value === '') merged.delete(key);
    }
  }
  return bind(schema, expandFlat(schema, merged, options), options);
}

/**
 * Expand flat input into the nested shape `bind()` expects, walking the schema
 * segment by segment.
 *
 * Keys that do not resolve against the schema, malformed keys and sequence
 * indexes above `maxSequenceIndex` are skipped. Unreferenced sequence indexes
 * below the highest one stay as holes. When a key names a mapping or sequence
 * position directly and other keys reach inside it, the nested keys win.
 */
export function expandFlat(schema: Schema, data: FlatInput, options?: BindOptions): unknown {
  const maxIndex = options?.maxSequenceIndex ?? DEFAULT_MAX_SEQUENCE_INDEX;
  const expander = new FlatExpander();
  let root: unknown = undefined;

  for (const [key, value] of entriesOf(data)) {
    const path = parsePath(key);
    if (path === null || !resolvesAgainst(schema, path, maxIndex)) continue;
    root = expander.place(root, schema, path, 0, value);
  }
  return root;
}

/**
 * Memoize `expandFlat` per input object.
 *
 * Results are held in a `WeakMap`, so an entry lives only as long as the input
 * it was computed from. Callers must not mutate an input after expanding it.
 */
export function createCachedExpander(schema: Schema, options?: BindOptions): (data: FlatInput) => unknown {
  const cache = new WeakMap<object, unknown>();
  return (data) => {
    if (cache.has(data)) return cache.get(data);
    const expanded = expandFlat(schema, data, options);
    cache.set(data, expanded);
    return expanded;
  };
}

function buildField(
  schema: Schema,
  input: unknown,
  name: FieldName,
  fullName: string,
  parent: BoundMap | BoundSequence | undefined,
  settings: FieldSettings,
): AnyBoundField {
  const raw = schema.preProcessor(input);

  switch (schema.kind) {
    case 'leaf':
      return new BoundLeaf({ schema, name, fullName, rawData: raw, parent, settings });

    case 'map': {
      const rawData = isRecord(raw) ? raw : undefined;
      const entries = [...schema.entries()];
      return new BoundMap({ schema, name, fullName, rawData, parent, settings }, (self) => {
        const fields = new Map<string, AnyBoundField>();
        for (const [key, child] of entries) {
          const value = rawData === undefined ? undefined : ownValue(rawData, key);
          fields.set(key, buildField(child, value, key, childPath(fullName, keySegment(key)), self, settings));
        }
        return fields;
      });
    }

    case 'sequence': {
      const rawData: readonly unknown[] | undefined = Array.isArray(raw) ? raw : undefined;
      const element = schema.element;
      return new BoundSequence({ schema, name, fullName, rawData, parent, settings }, (self) => {
        const items: AnyBoundField[] = [];
        if (rawData === undefined) return items;
        for (let index = 0; index < rawData.length; index++) {
          const path = childPath(fullName, indexSegment(index));
          items.push(buildField(element, rawData[index], index, path, self, settings));
        }
        return items;
      });
    }
  }
}

function resolvesAgainst(schema: Schema, path: readonly PathSegment[], maxIndex: number): boolean {
  let node: Schema | undefined = schema;
  for (const segment of path) {
    if (node === undefined) return false;
    if (segment.kind === 'key') {
      node = node.kind === 'map' ? node.get(segment.key) : undefined;
    } else {
      if (segment.index > maxIndex) return false;
      node = node.kind === 'sequence' ? node.element : undefined;
    }
  }
  return node !== undefined;
}

/** Builds nested containers for flat keys, tracking which containers it created itself. */
class FlatExpander {
  private readonly owned = new WeakSet<object>();

  place(slot: unknown, schema: Schema, path: readonly PathSegment[], depth: number, value: unknown): unknown {
    const segment = path[depth];
    if (segment === undefined) {
      return this.isOwned(slot) ? slot : value;
    }

    if (segment.kind === 'key' && schema.kind === 'map') {
      const child = schema.get(segment.key);
      if (child === undefined) return slot;
      const container = this.isOwnedRecord(slot) ? slot : this.own<Record<string, unknown>>({});
      container[segment.key] = this.place(ownValue(container, segment.key), child, path, depth + 1, value);
      return container;
    }

    if (segment.kind === 'index' && schema.kind === 'sequence') {
      const container = this.isOwnedList(slot) ? slot : this.own<unknown[]>([]);
      container[segment.index] = this.place(container[segment.index], schema.element, path, depth + 1, value);
      return container;
    }

    return slot;
  }

  private own<T extends object>(container: T): T {
    this.owned.add(container);
    return container;
  }

  private isOwned(slot: unknown): boolean {
    return this.isOwnedRecord(slot) || this.isOwnedList(slot);
  }

  private isOwnedRecord(slot: unknown): slot is Record<string, unknown> {
    return isRecord(slot) && this.owned.has(slot);
  }

  private isOwnedList(slot: unknown): slot is unknown[] {
    return Array.isArray(slot) && this.owned.has(slot);
  }
}

function entriesOf(data: FlatInput): Iterable<readonly [string, unknown]> {
  return isEntryIterable(data) ? data : Object.entries(data);
}

function isEntryIterable(data: FlatInput): data is Iterable<readonly [string, unknown]> {
  return Symbol.iterator in data;
}

function countFields(field: AnyBoundField): number {
  return field.children().reduce((count, child) => count + countFields(child), 1);
}
