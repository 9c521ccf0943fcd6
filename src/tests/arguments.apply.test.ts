import { describe, expect, test } from 'vitest';

import { argskwargs } from '../arguments';
import { collect, createSpyTarget } from './helpers';

describe('Eager application: apply() and calling the bundle.', () => {
  describe('Without extras', () => {
    test('calls the target with positionals, then the named record', () => {
      expect(argskwargs([1, 2], { a: 3 }).apply(collect)).toEqual([
        1,
        2,
        { a: 3 }
      ]);
    });

    test('an empty bundle passes only an empty named record', () => {
      expect(argskwargs().apply(collect)).toEqual([{}]);
    });

    test('returns whatever the target returns', () => {
      const add = (a: number, b: number, { scale }: { scale: number }) =>
        (a + b) * scale;

      expect(argskwargs([1, 2], { scale: 10 }).apply(add)).toBe(30);
    });

    test('passes the stored named record itself', () => {
      const bundle = argskwargs([1], { a: 1 });
      const { target, calls } = createSpyTarget('done');

      bundle.apply(target);

      expect(calls).toHaveLength(1);
      expect(calls[0]?.named).toBe(bundle.named);
    });

    test('empty extras take the same zero-copy path', () => {
      const bundle = argskwargs([1], { a: 1 });
      const { target, calls } = createSpyTarget('done');

      bundle.apply(target, [], {});

      expect(calls[0]?.named).toBe(bundle.named);
      expect(calls[0]?.positionals).toEqual([1]);
    });
  });

  describe('With extras', () => {
    test('extra positionals follow the stored ones', () => {
      expect(argskwargs([1, 2]).apply(collect, [3, 4])).toEqual([
        1,
        2,
        3,
        4,
        {}
      ]);
    });

    test('extra named values are merged in', () => {
      expect(argskwargs([1], { a: 2 }).apply(collect, [3], { b: 4 })).toEqual([
        1,
        3,
        { a: 2, b: 4 }
      ]);
    });

    test('an extra named value overrides the stored one', () => {
      expect(argskwargs([], { a: 1 }).apply(collect, [], { a: 2 })).toEqual([
        { a: 2 }
      ]);
    });

    test('a merged record is passed, the stored one is untouched', () => {
      const bundle = argskwargs([], { a: 1 });
      const { target, calls } = createSpyTarget(undefined);

      bundle.apply(target, [], { b: 2 });

      expect(calls[0]?.named).not.toBe(bundle.named);
      expect(calls[0]?.named).toEqual({ a: 1, b: 2 });
      expect(bundle.named).toEqual({ a: 1 });
    });

    test('the merged record is frozen, like the stored one', () => {
      const bundle = argskwargs([], { a: 1 });
      const { target, calls } = createSpyTarget(undefined);

      bundle.apply(target);
      bundle.apply(target, [], { b: 2 });

      expect(Object.isFrozen(calls[0]?.named)).toBe(true);
      expect(Object.isFrozen(calls[1]?.named)).toBe(true);
    });

    test('writing to the received record fails on both paths', () => {
      const bundle = argskwargs([], { a: 1 });
      const mark = (named: Record<string, unknown>) => {
        named.seen = true;
      };

      expect(() => bundle.apply(mark)).toThrow(TypeError);
      expect(() => bundle.apply(mark, [], { b: 2 })).toThrow(TypeError);
    });

    test('symbol-keyed extras are merged in', () => {
      const key = Symbol('extra');
      const { target, calls } = createSpyTarget(undefined);

      argskwargs([], { a: 1 }).apply(target, [], { [key]: 'value' });

      expect(calls[0]?.named).toEqual({ a: 1, [key]: 'value' });
      expect(Reflect.get(Object(calls[0]?.named), key)).toBe('value');
    });

    test('typed targets see the merged record', () => {
      const describeUser = (
        id: number,
        { role, active }: { role: string; active: boolean }
      ) => `${id}:${role}:${active}`;

      expect(
        argskwargs([7], { role: 'viewer', active: true }).apply(describeUser, [], {
          role: 'admin'
        })
      ).toBe('7:admin:true');
    });
  });

  describe('Calling the bundle', () => {
    test('bundle(target) is bundle.apply(target)', () => {
      const bundle = argskwargs([1, 2], { a: 3 });

      expect(bundle(collect)).toEqual(bundle.apply(collect));
    });

    test('bundle(target) passes the stored named record itself', () => {
      const bundle = argskwargs(['x'], { flag: true });
      const { target, calls } = createSpyTarget(0);

      expect(bundle(target)).toBe(0);
      expect(calls[0]?.named).toBe(bundle.named);
    });
  });

  describe('Errors', () => {
    test('errors thrown by the target propagate unchanged', () => {
      const failure = new RangeError('out of range');
      const fail = (): never => {
        throw failure;
      };

      let caught: unknown;
      try {
        argskwargs([1]).apply(fail);
      } catch (error) {
        caught = error;
      }

      expect(caught).toBe(failure);
    });

    test('non-Error throwables propagate unchanged', () => {
      const fail = (): never => {
        throw 'plain string';
      };

      let caught: unknown;
      try {
        argskwargs([], { a: 1 }).apply(fail, [2]);
      } catch (error) {
        caught = error;
      }

      expect(caught).toBe('plain string');
    });
  });
});
