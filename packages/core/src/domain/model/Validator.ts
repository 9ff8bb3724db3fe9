/** Local name of a field in its parent: a key for mappings, an index for sequences, `''` for the root. */
export type FieldName = string | number;

/** Validation outcome of one child, as seen by its parent's validator. */
export interface ChildOutcome {
  readonly valid: boolean;
  /** The child's clean data; `undefined` when the child failed. */
  readonly cleanData: unknown;
}

/** Outcomes of every child of a container field, in declaration (mapping) or index (sequence) order. */
export type ChildOutcomes =
  | { readonly shape: 'map'; readonly outcomes: ReadonlyMap<string, ChildOutcome> }
  | { readonly shape: 'sequence'; readonly outcomes: readonly ChildOutcome[] };

/**
 * Read-only view of the field being validated.
 *
 * Validators never receive the bound field itself, so sibling state is only
 * reachable through a parent's `children`.
 */
export interface ValidationContext {
  readonly name: FieldName;
  readonly fullName: string;
  /** Present for mapping and sequence fields; children are always validated first. */
  readonly children?: ChildOutcomes;
}

/**
 * Accepts and optionally transforms a value.
 *
 * Rejection is signalled by throwing a `ValidationFailure`; anything else
 * thrown is treated as a programming error and propagates to the caller.
 */
export type Validator<TOut = unknown> = (value: unknown, context: ValidationContext) => TOut;

/** Normalizes raw input at bind time, before any validation runs. */
export type PreProcessor = (raw: unknown) => unknown;
