import { ConfigurationError, NamingConventionError } from 'lib/errors';
import {
  assertValidDbName,
  deriveInstanceIdentifiers,
  instanceSuffix,
  isValidRdsIdentifier,
} from 'lib/resolvers';

describe('deriveInstanceIdentifiers', () => {
  test('single primary keeps the base identifier', () => {
    expect(deriveInstanceIdentifiers('ordb', 1, false)).toEqual(['ordb']);
  });

  test('single primary ignores a template without placeholder', () => {
    expect(deriveInstanceIdentifiers('ordb', 1, false, 'ordb-primary')).toEqual(['ordb']);
  });

  test('several primaries get numbered suffixes', () => {
    expect(deriveInstanceIdentifiers('ordb', 3, false)).toEqual(['ordb-01', 'ordb-02', 'ordb-03']);
  });

  test('a single replica is always suffixed', () => {
    expect(deriveInstanceIdentifiers('ordb', 1, true)).toEqual(['ordb-01']);
  });

  test('every placeholder in a custom template is replaced', () => {
    expect(deriveInstanceIdentifiers('ordb', 2, true, 'ordb-I-dr')).toEqual(['ordb-01-dr', 'ordb-02-dr']);
    expect(deriveInstanceIdentifiers('db', 1, true, 'db-I-x-I')).toEqual(['db-01-x-01']);
  });

  test('ninth instance uses -09', () => {
    expect(deriveInstanceIdentifiers('ordb', 9, false)[8]).toBe('ordb-09');
    expect(instanceSuffix(8)).toBe('-09');
  });

  test.each([0, 10, 1.5])('instanceCount %p is rejected', (count) => {
    expect(() => deriveInstanceIdentifiers('ordb', count, false)).toThrow(ConfigurationError);
  });

  test('template without placeholder is rejected when derivation applies', () => {
    expect(() => deriveInstanceIdentifiers('ordb', 2, false, 'ordb-primary')).toThrow(ConfigurationError);
  });

  test('invalid base identifier is rejected', () => {
    expect(() => deriveInstanceIdentifiers('ordb-', 1, false)).toThrow(NamingConventionError);
    expect(() => deriveInstanceIdentifiers('1ordb', 1, false)).toThrow(NamingConventionError);
  });

  test('derived identifier with a double hyphen is rejected', () => {
    expect(() => deriveInstanceIdentifiers('ordb', 2, false, 'ordb--I')).toThrow(
      'Derived DB instance identifier "ordb--01"',
    );
  });

  test('derived identifier longer than 63 characters is rejected', () => {
    const base = 'a'.repeat(61);
    expect(() => deriveInstanceIdentifiers(base, 1, false)).not.toThrow();
    expect(() => deriveInstanceIdentifiers(base, 2, false)).toThrow(NamingConventionError);
  });
});

describe('naming rules', () => {
  test.each([
    ['ordb', true],
    ['OrDb-01', true],
    ['a', true],
    ['ordb-', false],
    ['or--db', false],
    ['or_db', false],
    ['9ordb', false],
    ['a'.repeat(63), true],
    ['a'.repeat(64), false],
  ])('isValidRdsIdentifier(%p) is %p', (value, expected) => {
    expect(isValidRdsIdentifier(value)).toBe(expected);
  });

  test('Oracle SID must be at most 8 alphanumerics starting with a letter', () => {
    expect(() => assertValidDbName('ORCL')).not.toThrow();
    expect(() => assertValidDbName('ORCL1234')).not.toThrow();
    expect(() => assertValidDbName('ORCL12345')).toThrow(NamingConventionError);
    expect(() => assertValidDbName('1ORCL')).toThrow(NamingConventionError);
    expect(() => assertValidDbName('OR_CL')).toThrow(NamingConventionError);
  });

  test('NamingConventionError carries the offending value', () => {
    let caught: unknown;
    try {
      assertValidDbName('bad_name');
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(NamingConventionError);
    expect(caught).toMatchObject({ name: 'NamingConventionError', value: 'bad_name' });
  });
});
