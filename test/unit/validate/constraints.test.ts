import { checkStorage, readConstraints, validateStorage } from '../../../src/validate/constraints.js';
import { makeQuantity } from '../../../src/parser/quantity.js';
import { ConstraintViolation, ParseError, PartitionSyntaxError } from '../../../src/shared/errors.js';
import type { ConfigValue } from '../../../src/types/config.js';

function values(entries: Record<string, ConfigValue>): Map<string, ConfigValue> {
  return new Map(Object.entries(entries));
}

function violationOf(fn: () => unknown): ConstraintViolation {
  try {
    fn();
  } catch (err) {
    if (err instanceof ConstraintViolation) return err;
    throw err;
  }
  throw new Error('expected a ConstraintViolation');
}

describe('root scheme allow-list', () => {
  it('rejects a scheme outside root_device_types', () => {
    const err = violationOf(() =>
      validateStorage(values({ default_scheme: 'BTRFS' }), values({ root_device_types: 'LVM_THINP' })),
    );
    expect(err.violations).toEqual([
      {
        check: 'root-scheme',
        message: 'unsupported root scheme: BTRFS (allowed: LVM_THINP)',
        detail: { scheme: 'BTRFS', allowed: ['LVM_THINP'] },
      },
    ]);
    expect(err.message).toBe(
      'Storage configuration violates 1 constraint(s): unsupported root scheme: BTRFS (allowed: LVM_THINP)',
    );
  });

  it('accepts a listed scheme from a multi-line list', () => {
    const result = validateStorage(
      values({ default_scheme: 'LVM_THINP' }),
      values({ root_device_types: ['LVM', 'LVM_THINP'] }),
    );
    expect(result.valid).toBe(true);
    expect(result.defaultScheme).toBe('LVM_THINP');
  });

  it('accepts any scheme when the allow-list is absent or empty', () => {
    expect(checkStorage(values({ default_scheme: 'PLAIN' }), values({})).valid).toBe(true);
    expect(checkStorage(values({ default_scheme: 'PLAIN' }), values({ root_device_types: '' })).valid).toBe(true);
  });
});

describe('minimum sizes', () => {
  const constraints = values({ req_partition_sizes: '/var 10 GiB' });

  it('passes when the committed size meets the requirement', () => {
    const result = validateStorage(values({ default_partitioning: ['/var (size 15 GiB)'] }), constraints);
    expect(result.valid).toBe(true);
    expect(result.rules).toEqual([
      { rule: { mountPoint: '/var', kind: 'size', size: makeQuantity(15, 'GiB') }, ok: true, violations: [] },
    ]);
  });

  it('reports required and committed sizes when the rule is too small', () => {
    const result = checkStorage(values({ default_partitioning: ['/var (size 5 GiB)'] }), constraints);
    expect(result.valid).toBe(false);
    expect(result.violations).toEqual([
      {
        check: 'minimum-size',
        mountPoint: '/var',
        message: 'below minimum required size: /var requires 10 GiB, committed 5 GiB',
        detail: {
          mountPoint: '/var',
          required: '10 GiB',
          committed: '5 GiB',
          requiredBytes: 10737418240,
          committedBytes: 5368709120,
        },
      },
    ]);
    expect(result.rules[0]?.ok).toBe(false);
  });

  it('counts a min rule as its committed size', () => {
    expect(checkStorage(values({ default_partitioning: '/var (min 12 GiB)' }), constraints).valid).toBe(true);
    expect(checkStorage(values({ default_partitioning: '/var (min 8 GiB)' }), constraints).valid).toBe(false);
  });

  it('compares across units', () => {
    const result = checkStorage(values({ default_partitioning: '/var (size 10240 MiB)' }), constraints);
    expect(result.valid).toBe(true);
    expect(checkStorage(values({ default_partitioning: '/var (size 10239 MiB)' }), constraints).valid).toBe(false);
  });

  it('assumes the requirement is met when the layout has no sized rule for it', () => {
    expect(checkStorage(values({ default_partitioning: '/srv' }), constraints).valid).toBe(true);
    expect(checkStorage(values({ default_partitioning: '/var' }), constraints).valid).toBe(true);
  });
});

describe('dedicated volumes', () => {
  const constraints = values({ must_not_be_on_root: '/var' });

  it('flags a listed mount point with no layout rule', () => {
    const result = checkStorage(values({ default_partitioning: '/ (min 1 GiB)' }), constraints);
    expect(result.violations).toEqual([
      {
        check: 'dedicated-volume',
        mountPoint: '/var',
        message: 'mount point requires dedicated volume: /var',
        detail: { mountPoint: '/var', policy: 'on-root' },
      },
    ]);
    expect(result.rules[0]?.ok).toBe(true);
  });

  it('is satisfied by any rule for the mount point', () => {
    expect(checkStorage(values({ default_partitioning: ['/ (min 1 GiB)', '/var'] }), constraints).valid).toBe(true);
  });

  it('skips the check under the ignore policy', () => {
    const result = checkStorage(values({ default_partitioning: '/ (min 1 GiB)' }), constraints, {
      unlistedMountPolicy: 'ignore',
    });
    expect(result.valid).toBe(true);
  });
});

describe('collecting violations', () => {
  it('reports every violation in check order', () => {
    const storage = values({ default_scheme: 'BTRFS', default_partitioning: ['/ (min 1 GiB)', '/home (size 1 GiB)'] });
    const constraints = values({
      root_device_types: 'LVM_THINP',
      must_not_be_on_root: '/var',
      req_partition_sizes: ['/home 2 GiB'],
    });
    const err = violationOf(() => validateStorage(storage, constraints));
    expect(err.violations.map((v) => v.check)).toEqual(['root-scheme', 'dedicated-volume', 'minimum-size']);
    expect(checkStorage(storage, constraints).rules.map((v) => v.ok)).toEqual([true, false]);
  });

  it('freezes the result', () => {
    const result = checkStorage(values({}), values({}));
    expect(Object.isFrozen(result)).toBe(true);
    expect(Object.isFrozen(result.violations)).toBe(true);
  });

  it('propagates partition syntax errors', () => {
    expect(() => checkStorage(values({ default_partitioning: '/var (max 1 GiB)' }), values({}))).toThrow(
      PartitionSyntaxError,
    );
  });
});

describe('readConstraints', () => {
  it('defaults swap_is_recommended to true', () => {
    expect(readConstraints(values({})).swapRecommended).toBe(true);
    expect(readConstraints(values({ swap_is_recommended: 'False' })).swapRecommended).toBe(false);
  });

  it('rejects a non-boolean swap flag with its source file', () => {
    expect(() =>
      readConstraints(values({ swap_is_recommended: 'maybe' }), { sourceOf: () => 'product.conf' }),
    ).toThrow(new ParseError('expected a boolean, found "maybe"', {
      path: 'product.conf',
      section: 'Storage Constraints',
      key: 'swap_is_recommended',
    }));
  });

  it('splits whitespace-separated tokens', () => {
    expect(readConstraints(values({ root_device_types: 'LVM LVM_THINP BTRFS' })).rootDeviceTypes).toEqual([
      'LVM',
      'LVM_THINP',
      'BTRFS',
    ]);
  });
});
