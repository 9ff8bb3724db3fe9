import { describe, it, expect, vi } from 'vitest';
import { bind } from '../../../src/domain/services/Binder.js';
import { LeafSchema, MapSchema, makeSchema } from '../../../src/domain/model/Schema.js';
import { allChildren, chain, ensureString, fromPredicate, required } from '../../../src/domain/services/validators.js';
import { DeferredMessage, ValidationFailure } from '../../../src/domain/model/ValidationFailure.js';
import { keySegment } from '../../../src/domain/model/FieldPath.js';
import { EventBus } from '../../../src/application/EventBus.js';
import type { TreeEvent } from '../../../src/domain/events/DomainEvents.js';
import type { ValidationContext, Validator } from '../../../src/domain/model/Validator.js';

function tracking(order: string[]): Validator {
  return (value, context) => {
    order.push(context.fullName);
    return value;
  };
}

describe('BoundField', () => {
  // ============================================================
  // Validation order and memoization
  // ============================================================

  describe('validate', () => {
    it('should report nothing before validation', () => {
      const root = bind(makeSchema({ a: required }), {});
      const a = root.resolve('a');

      expect(a?.validated).toBe(false);
      expect(a?.cleanData).toBeUndefined();
      expect(a?.error).toBeNull();
      expect(a?.failure).toBeNull();
    });

    it('should validate children before their parent', () => {
      const order: string[] = [];
      const track = tracking(order);
      const schema = new MapSchema(
        {
          a: new LeafSchema({ validator: track }),
          b: new MapSchema({ c: new LeafSchema({ validator: track }) }, { validator: chain(allChildren, track) }),
        },
        { validator: chain(allChildren, track) },
      );

      bind(schema, { a: 1, b: { c: 2 } }).validate();

      expect(order).toEqual(['a', 'b.c', 'b', '']);
    });

    it('should run each validator once', () => {
      const validator = vi.fn((value: unknown) => value);
      const root = bind(makeSchema({ a: validator }), { a: 'x' });

      expect(root.validate()).toBe(true);
      expect(root.validate()).toBe(true);
      expect(root.isValid()).toBe(true);
      expect(validator).toHaveBeenCalledOnce();
    });

    it('should not validate the parent when a child is validated alone', () => {
      const root = bind(makeSchema({ a: ensureString }), { a: 'x' });
      expect(root.resolve('a')?.validate()).toBe(true);
      expect(root.validated).toBe(false);
    });

    it('should give validators their name, full name and child outcomes', () => {
      const contexts: ValidationContext[] = [];
      const capture: Validator = (value, context) => {
        contexts.push(context);
        return value;
      };
      const root = bind(makeSchema({ tags: new LeafSchema({ validator: capture }), list: [capture] }), {
        tags: 't',
        list: ['x'],
      });
      root.validate();

      expect(contexts.map((context) => [context.name, context.fullName, context.children])).toEqual([
        ['tags', 'tags', undefined],
        [0, 'list:0', undefined],
      ]);
    });

    it('should pass the outcome of every child to a mapping validator', () => {
      let seen: ValidationContext | undefined;
      const root = bind(
        new MapSchema(
          { a: new LeafSchema({ validator: required }), b: new LeafSchema() },
          {
            validator: (value, context) => {
              seen = context;
              return value;
            },
          },
        ),
        { b: 2 },
      );
      root.validate();

      expect(seen?.children).toEqual({
        shape: 'map',
        outcomes: new Map([
          ['a', { valid: false, cleanData: undefined }],
          ['b', { valid: true, cleanData: 2 }],
        ]),
      });
      expect(root.isValid()).toBe(true);
    });

    it('should use the validator the schema had when it was bound', () => {
      const leaf = new LeafSchema({ validator: ensureString });
      const schema = new MapSchema({ a: leaf });
      const before = bind(schema, { a: 'x' });

      leaf.validator = fromPredicate(() => false, 'always fails');

      expect(before.validate()).toBe(true);
      expect(bind(schema, { a: 'x' }).validate()).toBe(false);
    });

    it('should propagate errors that are not validation failures', () => {
      const root = bind(
        makeSchema({
          a: () => {
            throw new TypeError('validator bug');
          },
        }),
        {},
      );
      expect(() => root.validate()).toThrow(TypeError);
      expect(root.validated).toBe(false);
    });
  });

  // ============================================================
  // Error messages
  // ============================================================

  describe('error', () => {
    it('should hold only the field own error', () => {
      const root = bind(makeSchema({ address: { street: required } }), { address: {} });
      root.validate();

      expect(root.error).toBe(' has invalid fields');
      expect(root.resolve('address')?.error).toBe('address has invalid fields');
      expect(root.resolve('address.street')?.error).toBe('street is required.');
    });

    it('should render lazily and only once through the configured renderer', () => {
      const renderMessage = vi.fn((template: string) => template.toUpperCase());
      const root = bind(makeSchema({ a: required }), {}, { renderMessage });
      root.validate();

      expect(renderMessage).not.toHaveBeenCalled();
      const a = root.resolve('a');
      expect(a?.error).toBe('{FIELD.NAME} IS REQUIRED.');
      expect(a?.error).toBe('{FIELD.NAME} IS REQUIRED.');
      expect(renderMessage).toHaveBeenCalledOnce();
      expect(renderMessage).toHaveBeenCalledWith('{field.name} is required.', {
        field: { name: 'a', fullName: 'a' },
      });
    });

    it('should let message params override the field', () => {
      const validator = fromPredicate(() => false, new DeferredMessage('{field} is not allowed', { field: 'Email' }));
      const root = bind(makeSchema({ email: validator }), { email: 'x' });
      root.validate();

      expect(root.resolve('email')?.error).toBe('Email is not allowed');
    });

    it('should expose the failure with its code and value', () => {
      const root = bind(makeSchema({ a: ensureString }), { a: 4 });
      root.validate();
      const failure = root.resolve('a')?.failure;

      expect(failure).toBeInstanceOf(ValidationFailure);
      expect(failure?.code).toBe('TYPE_MISMATCH');
      expect(failure?.value).toBe(4);
    });
  });

  // ============================================================
  // Navigation
  // ============================================================

  describe('navigation', () => {
    const schema = makeSchema({ address: { street: ensureString }, tags: [ensureString] });

    it('should resolve paths relative to a field', () => {
      const root = bind(schema, { address: { street: 'Main' }, tags: ['a', 'b'] });
      const address = root.resolve('address');

      expect(root.resolve('')).toBe(root);
      expect(address?.resolve('street')).toBe(root.resolve('address.street'));
      expect(root.resolve('tags:1')?.rawData).toBe('b');
    });

    it('should return undefined for positions the tree does not have', () => {
      const root = bind(schema, { tags: ['a'] });

      expect(root.resolve('address.city')).toBeUndefined();
      expect(root.resolve('tags:1')).toBeUndefined();
      expect(root.resolve('address:0')).toBeUndefined();
      expect(root.resolve('tags.name')).toBeUndefined();
      expect(root.resolve('tags:')).toBeUndefined();
    });

    it('should link fields to their parent and root', () => {
      const root = bind(schema, { address: { street: 'Main' } });
      const street = root.resolve('address.street');

      expect(street?.parent).toBe(root.resolve('address'));
      expect(street?.root).toBe(root);
      expect(root.parent).toBeUndefined();
    });

    it('should return resolved fields and the root as narrowable by kind', () => {
      const root = bind(schema, { address: { street: 'Main' }, tags: ['a', 'b'] });
      const tags = root.resolve('tags');
      const address = root.resolve('address');
      const top = root.resolve('address.street')?.root;

      expect(tags?.kind === 'sequence' ? [tags.length, tags.at(1)?.rawData] : undefined).toEqual([2, 'b']);
      expect(address?.kind === 'map' ? address.get('street')?.rawData : undefined).toBe('Main');
      expect(top?.kind === 'map' ? [...top.keys()] : undefined).toEqual(['address', 'tags']);
      expect(top).toBe(root);
    });

    it('should iterate over children in declaration order', () => {
      const root = bind(schema, {});
      expect([...root].map((child) => child.name)).toEqual(['address', 'tags']);
      expect(root.kind === 'map' ? root.child(keySegment('tags'))?.kind : undefined).toBe('sequence');
    });

    it('should only return sequence elements for valid indexes', () => {
      const tags = bind(schema, { tags: ['a', 'b'] }).resolve('tags');
      const sequence = tags?.kind === 'sequence' ? tags : undefined;

      expect(sequence?.at(0)?.rawData).toBe('a');
      expect(sequence?.at(-1)).toBeUndefined();
      expect(sequence?.at(1.5)).toBeUndefined();
    });
  });

  // ============================================================
  // Events
  // ============================================================

  describe('events', () => {
    it('should publish field results children first, then the tree result', () => {
      const events = new EventBus<TreeEvent>();
      const seen: string[] = [];
      events.onAny((event) => {
        seen.push('fullName' in event ? `${event.type}:${event.fullName}` : event.type);
      });

      const root = bind(makeSchema({ a: required, b: ensureString }), { b: 'x' }, { events });
      root.validate();
      root.validate();

      expect(seen).toEqual(['tree:bound', 'field:failed:a', 'field:validated:b', 'field:failed:', 'tree:validated']);
    });

    it('should include the code and rejected value in failure events', () => {
      const events = new EventBus<TreeEvent>();
      const failed = vi.fn();
      const finished = vi.fn();
      events.on('field:failed', failed);
      events.on('tree:validated', finished);

      bind(makeSchema({ a: ensureString }), { a: 9 }, { events }).validate();

      expect(failed.mock.calls[0]?.[0]).toMatchObject({ fullName: 'a', code: 'TYPE_MISMATCH', value: 9 });
      expect(finished.mock.calls[0]?.[0]).toMatchObject({ valid: false });
    });
  });
});
