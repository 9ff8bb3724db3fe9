import type { ChildOutcome, ChildOutcomes, FieldName, ValidationContext, Validator } from './Validator.js';
import type { Schema } from './Schema.js';
import type { MessageRenderer } from '../services/MessageRenderer.js';
import type { EventBus } from '../../application/EventBus.js';
import type { TreeEvent } from '../events/DomainEvents.js';
import { isValidationFailure, type ValidationFailure } from './ValidationFailure.js';
import { parsePath, type PathSegment } from './FieldPath.js';

/** Settings shared by every field of one bound tree. */
export interface FieldSettings {
  readonly renderMessage: MessageRenderer;
  readonly events?: EventBus<TreeEvent>;
}

/** Constructor input for a bound field. Built by the binder. */
export interface FieldInit {
  readonly schema: Schema;
  readonly name: FieldName;
  readonly fullName: string;
  readonly rawData: unknown;
  readonly parent: BoundMap | BoundSequence | undefined;
  readonly settings: FieldSettings;
}

type FieldState =
  | { readonly valid: true; readonly cleanData: unknown }
  | { readonly valid: false; readonly failure: ValidationFailure };

/**
 * A schema position paired with the input found there.
 *
 * Nothing is validated until `validate()` (or `isValid()`) is called; until
 * then `cleanData` is `undefined` and `error` is `null`.
 */
export abstract class BoundField {
  abstract readonly kind: 'leaf' | 'map' | 'sequence';
  readonly schema: Schema;
  readonly name: FieldName;
  readonly fullName: string;
  /** Pre-processed input, `undefined` when the input had nothing (or the wrong shape) here. */
  readonly rawData: unknown;
  /** Back-reference only; used for `root` and never for ownership. */
  readonly parent: BoundMap | BoundSequence | undefined;
  protected readonly settings: FieldSettings;
  // Captured at bind time so later schema changes leave this tree untouched.
  private readonly validator: Validator;
  private state: FieldState | undefined;
  private renderedError: string | undefined;

  protected constructor(init: FieldInit) {
    this.schema = init.schema;
    this.name = init.name;
    this.fullName = init.fullName;
    this.rawData = init.rawData;
    this.parent = init.parent;
    this.settings = init.settings;
    this.validator = init.schema.validator;
  }

  /** Child fields in declaration or index order; empty for leaves. */
  abstract children(): readonly AnyBoundField[];

  /** The child addressed by a single path segment, if any. */
  abstract child(segment: PathSegment): AnyBoundField | undefined;

  protected abstract childOutcomes(): ChildOutcomes | undefined;

  /** This field as a member of the `AnyBoundField` union. */
  protected abstract self(): AnyBoundField;

  /** Whether `validate()` has run on this field. */
  get validated(): boolean {
    return this.state !== undefined;
  }

  /** The validator's output; `undefined` before validation or when it failed. */
  get cleanData(): unknown {
    return this.state?.valid === true ? this.state.cleanData : undefined;
  }

  /** The failure raised by this field's own validator, if any. */
  get failure(): ValidationFailure | null {
    return this.state?.valid === false ? this.state.failure : null;
  }

  /** Rendered error message of this field's own validator. Child errors are never included. */
  get error(): string | null {
    const failure = this.failure;
    if (failure === null) return null;
    this.renderedError ??= this.settings.renderMessage(failure.deferred.template, {
      field: { name: this.name, fullName: this.fullName },
      ...failure.deferred.params,
    });
    return this.renderedError;
  }

  get root(): AnyBoundField {
    return this.parent === undefined ? this.self() : this.parent.root;
  }

  /**
   * Validate children first, then this field. Memoized: later calls return the stored outcome.
   *
   * Returns whether this field's own validator succeeded. With the default
   * `allChildren` validator that implies every descendant is valid too.
   */
  validate(): boolean {
    if (this.state !== undefined) return this.state.valid;

    for (const child of this.children()) {
      child.validate();
    }

    const context: ValidationContext = {
      name: this.name,
      fullName: this.fullName,
      children: this.childOutcomes(),
    };

    let state: FieldState;
    try {
      state = { valid: true, cleanData: this.validator(this.rawData, context) };
    } catch (error) {
      if (!isValidationFailure(error)) throw error;
      state = { valid: false, failure: error };
    }

    this.state = state;
    this.publish(state);
    return state.valid;
  }

  isValid(): boolean {
    return this.validate();
  }

  /**
   * Find a descendant by its path relative to this field (`''` is the field itself).
   * Returns `undefined` for malformed paths and positions the tree does not have.
   */
  resolve(path: string): AnyBoundField | undefined {
    const segments = parsePath(path);
    if (segments === null) return undefined;
    let node: AnyBoundField = this.self();
    for (const segment of segments) {
      const current: BoundField = node;
      const next = current.child(segment);
      if (next === undefined) return undefined;
      node = next;
    }
    return node;
  }

  [Symbol.iterator](): Iterator<AnyBoundField> {
    return this.children()[Symbol.iterator]();
  }

  protected outcomeOf(field: BoundField): ChildOutcome {
    return { valid: field.isValid(), cleanData: field.cleanData };
  }

  private publish(state: FieldState): void {
    const events = this.settings.events;
    if (events === undefined) return;

    if (state.valid) {
      events.emit({ type: 'field:validated', fullName: this.fullName, timestamp: Date.now() });
    } else {
      events.emit({
        type: 'field:failed',
        fullName: this.fullName,
        code: state.failure.code,
        value: state.failure.value,
        timestamp: Date.now(),
      });
    }
    if (this.parent === undefined) {
      events.emit({ type: 'tree:validated', valid: state.valid, timestamp: Date.now() });
    }
  }
}

/** A field bound to a `LeafSchema`. */
export class BoundLeaf extends BoundField {
  readonly kind = 'leaf' as const;

  constructor(init: FieldInit) {
    super(init);
  }

  children(): readonly AnyBoundField[] {
    return [];
  }

  child(): AnyBoundField | undefined {
    return undefined;
  }

  protected self(): BoundLeaf {
    return this;
  }

  protected childOutcomes(): ChildOutcomes | undefined {
    return undefined;
  }
}

/** A field bound to a `MapSchema`. Always has one child per schema key. */
export class BoundMap extends BoundField {
  readonly kind = 'map' as const;
  private readonly fields: ReadonlyMap<string, AnyBoundField>;

  constructor(init: FieldInit, makeChildren: (parent: BoundMap) => ReadonlyMap<string, AnyBoundField>) {
    super(init);
    this.fields = makeChildren(this);
  }

  get(name: string): AnyBoundField | undefined {
    return this.fields.get(name);
  }

  keys(): IterableIterator<string> {
    return this.fields.keys();
  }

  children(): readonly AnyBoundField[] {
    return [...this.fields.values()];
  }

  child(segment: PathSegment): AnyBoundField | undefined {
    return segment.kind === 'key' ? this.fields.get(segment.key) : undefined;
  }

  protected self(): BoundMap {
    return this;
  }

  protected childOutcomes(): ChildOutcomes {
    const outcomes = new Map<string, ChildOutcome>();
    for (const [name, field] of this.fields) {
      outcomes.set(name, this.outcomeOf(field));
    }
    return { shape: 'map', outcomes };
  }
}

/** A field bound to a `SequenceSchema`. Has one child per element found in the input. */
export class BoundSequence extends BoundField {
  readonly kind = 'sequence' as const;
  private readonly items: readonly AnyBoundField[];

  constructor(init: FieldInit, makeChildren: (parent: BoundSequence) => readonly AnyBoundField[]) {
    super(init);
    this.items = makeChildren(this);
  }

  get length(): number {
    return this.items.length;
  }

  at(index: number): AnyBoundField | undefined {
    return Number.isInteger(index) && index >= 0 ? this.items[index] : undefined;
  }

  children(): readonly AnyBoundField[] {
    return this.items;
  }

  child(segment: PathSegment): AnyBoundField | undefined {
    return segment.kind === 'index' ? this.at(segment.index) : undefined;
  }

  protected self(): BoundSequence {
    return this;
  }

  protected childOutcomes(): ChildOutcomes {
    return { shape: 'sequence', outcomes: this.items.map((field) => this.outcomeOf(field)) };
  }
}

export type AnyBoundField = BoundLeaf | BoundMap | BoundSequence;
