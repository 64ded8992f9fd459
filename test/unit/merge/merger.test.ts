import { DEFAULT_ADDITIVE_KEYS, mergeChain } from '../../../src/merge/merger.js';
import { parseConfigText } from '../../../src/parser/unit-parser.js';
import type { ChainEntry, ChainRole, ProductChain } from '../../../src/types/config.js';

function entry(role: ChainRole, path: string, text: string): ChainEntry {
  return { role, file: parseConfigText(text, path) };
}

const base = entry(
  'base',
  'base.conf',
  [
    '[Storage]',
    'default_scheme = LVM',
    '[User Interface]',
    'hidden_spokes =',
    '    UserSpoke',
    '    PasswordSpoke',
    '[Payload]',
    'updates_repositories =',
    '    a',
    '    b',
    '',
  ].join('\n'),
);

const product = entry(
  'product',
  'product.conf',
  [
    '[Storage]',
    'default_scheme = BTRFS',
    'swap = 2 GiB',
    '[User Interface]',
    'hidden_spokes = NetworkSpoke',
    '[Payload]',
    'updates_repositories =',
    '    b',
    '    c',
    '[Vendor Extras]',
    'motd = hello',
    '',
  ].join('\n'),
);

describe('mergeChain', () => {
  it('lets the later file win for ordinary keys and records the source', () => {
    const merged = mergeChain([base, product]);
    expect(merged.get('Storage', 'default_scheme')).toBe('BTRFS');
    expect(merged.sourceOf('Storage', 'default_scheme')).toBe('product.conf');
  });

  it('keeps keys set only by earlier files', () => {
    const onlyBase = entry('product', 'p.conf', '[Storage]\nfile_system_type = xfs\n');
    const merged = mergeChain([base, onlyBase]);
    expect(merged.get('Storage', 'default_scheme')).toBe('LVM');
    expect(merged.sourceOf('Storage', 'default_scheme')).toBe('base.conf');
  });

  it('replaces non-additive lists wholesale', () => {
    expect(mergeChain([base, product]).get('User Interface', 'hidden_spokes')).toBe('NetworkSpoke');
  });

  it('concatenates additive keys in chain order without duplicates', () => {
    expect(mergeChain([base, product]).get('Payload', 'updates_repositories')).toEqual(['a', 'b', 'c']);
  });

  it('treats an empty additive value as contributing nothing', () => {
    const empty = entry('defaults', 'defaults.conf', '[Payload]\nupdates_repositories =\nother = x\n');
    const single = entry('product', 'p.conf', '[Payload]\nupdates_repositories = updates\n');
    expect(mergeChain([empty, single]).get('Payload', 'updates_repositories')).toEqual(['updates']);
  });

  it('accepts a custom additive key set', () => {
    const merged = mergeChain([base, product], {
      additiveKeys: [...DEFAULT_ADDITIVE_KEYS, { section: 'User Interface', key: 'hidden_spokes' }],
    });
    expect(merged.get('User Interface', 'hidden_spokes')).toEqual(['UserSpoke', 'PasswordSpoke', 'NetworkSpoke']);
  });

  it('carries sections it does not interpret', () => {
    const merged = mergeChain([base, product]);
    expect(merged.sectionNames()).toEqual(['Storage', 'User Interface', 'Payload', 'Vendor Extras']);
    expect(merged.section('Vendor Extras')).toEqual(new Map([['motd', 'hello']]));
  });

  it('returns an empty section map for unknown sections', () => {
    expect(mergeChain([base]).section('Nope').size).toBe(0);
    expect(mergeChain([base]).has('Nope', 'x')).toBe(false);
  });

  it('serializes in the input syntax', () => {
    expect(mergeChain([base, product]).serialize()).toBe(
      [
        '[Storage]',
        'default_scheme = BTRFS',
        'swap = 2 GiB',
        '',
        '[User Interface]',
        'hidden_spokes = NetworkSpoke',
        '',
        '[Payload]',
        'updates_repositories =',
        '    a',
        '    b',
        '    c',
        '',
        '[Vendor Extras]',
        'motd = hello',
        '',
      ].join('\n'),
    );
  });

  it('formats quantities in JSON output', () => {
    expect(mergeChain([base, product]).toJSON().Storage).toEqual({ default_scheme: 'BTRFS', swap: '2 GiB' });
  });

  it('is deterministic for the same chain', () => {
    const chain: ProductChain = [base, product];
    expect(mergeChain(chain).serialize()).toBe(mergeChain(chain).serialize());
  });
});
