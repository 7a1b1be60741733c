import { describe, test, expect } from 'vitest';
import { ErrFacet, ScalerError } from './scaler-error.js';

const Demo = ScalerError.boundary('demo');
const Missing = ErrFacet.marker('Missing');

const ErrThingMissing = Demo.define('thing_missing', {
  customProps: ErrFacet.props<{ thing: string }>(),
  facets: [Missing],
  message: (d) => `No thing called ${d.thing}`,
});

const ErrPlain = Demo.define('plain', {
  facets: [],
  message: () => 'Plain failure',
});

describe('ScalerError', () => {
  test('define prefixes the code with the boundary domain', () => {
    expect(ErrThingMissing.code).toBe('demo.thing_missing');
    expect(ErrThingMissing.domain).toBe('demo');
  });

  test('create builds the message and keeps the data', () => {
    const err = ErrThingMissing.create({ thing: 'widget' });
    expect(err).toBeInstanceOf(Error);
    expect(err.message).toBe('No thing called widget');
    expect(err.name).toBe('ScalerError[demo.thing_missing]');
    expect(err.data).toEqual({ thing: 'widget' });
  });

  test('discriminates by code, facet and domain', () => {
    const err = ErrThingMissing.create({ thing: 'widget' });
    expect(ErrThingMissing.is(err)).toBe(true);
    expect(ErrPlain.is(err)).toBe(false);
    expect(ScalerError.has(err, Missing)).toBe(true);
    expect(ScalerError.has(ErrPlain.create({}), Missing)).toBe(false);
    expect(err.domain).toBe('demo');
  });

  test('plain errors are not ScalerErrors', () => {
    const err = new Error('boom');
    expect(ScalerError.has(err, Missing)).toBe(false);
    expect(ErrPlain.is(err)).toBe(false);
  });

  describe('wrap', () => {
    test('returns ScalerErrors unchanged', () => {
      const err = ErrPlain.create({});
      expect(ScalerError.wrap(err)).toBe(err);
    });

    test('wraps other throwables as unknown', () => {
      const wrapped = ScalerError.wrap(new TypeError('bad type'));
      expect(wrapped.code).toBe('unknown');
      expect(wrapped.domain).toBe('unknown');
      expect(wrapped.message).toBe('bad type');
      expect(ScalerError.wrap('just a string').message).toBe('just a string');
    });
  });

  describe('prettyPrint', () => {
    test('prints code, message and data', () => {
      expect(ErrThingMissing.create({ thing: 'widget' }).prettyPrint()).toBe(
        'demo.thing_missing: No thing called widget\n  data: {"thing":"widget"}',
      );
    });

    test('omits data when there is none', () => {
      expect(ErrPlain.create({}).prettyPrint()).toBe('demo.plain: Plain failure');
    });

    test('prints the cause chain', () => {
      const err = ErrPlain.create({}, ErrThingMissing.create({ thing: 'widget' }));
      expect(err.prettyPrint()).toBe(
        [
          'demo.plain: Plain failure',
          '  └ caused by: demo.thing_missing: No thing called widget',
          '    data: {"thing":"widget"}',
        ].join('\n'),
      );
    });

    test('colours the code when asked', () => {
      expect(ErrPlain.create({}).prettyPrint({ color: true })).toBe('\x1b[31mdemo.plain\x1b[0m: Plain failure');
    });
  });
});
