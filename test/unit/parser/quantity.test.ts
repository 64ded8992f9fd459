import { compareQuantities, formatQuantity, makeQuantity, matchQuantity, parseQuantity } from '../../../src/parser/quantity.js';

describe('parseQuantity', () => {
  it('normalises binary units to bytes', () => {
    expect(parseQuantity('6 GiB')).toEqual({ kind: 'quantity', value: 6, unit: 'GiB', bytes: 6442450944 });
  });

  it('accepts decimal amounts and rounds to whole bytes', () => {
    expect(parseQuantity('1.5 MiB')?.bytes).toBe(1572864);
  });

  it('uses powers of 1000 for decimal units', () => {
    expect(parseQuantity('500 MB')?.bytes).toBe(500000000);
  });

  it('returns undefined for plain text', () => {
    expect(parseQuantity('8 beta')).toBeUndefined();
    expect(parseQuantity('CLOSEST_MIRROR')).toBeUndefined();
  });
});

describe('matchQuantity', () => {
  it('flags byte-shaped units it does not know', () => {
    expect(matchQuantity('10 XiB')).toEqual({ kind: 'bad-unit', unit: 'XiB' });
  });

  it('does not treat bit units as byte quantities', () => {
    expect(matchQuantity('10 Gb')).toEqual({ kind: 'not-a-quantity' });
  });
});

describe('formatQuantity / compareQuantities', () => {
  it('formats as "<value> <unit>"', () => {
    expect(formatQuantity(makeQuantity(15, 'GiB'))).toBe('15 GiB');
  });

  it('compares by byte count across units', () => {
    expect(compareQuantities(makeQuantity(1, 'GiB'), makeQuantity(1024, 'MiB'))).toBe(0);
    expect(compareQuantities(makeQuantity(1, 'GB'), makeQuantity(1, 'GiB'))).toBeLessThan(0);
  });
});
