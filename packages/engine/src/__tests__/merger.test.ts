import { describe, it, expect } from 'vitest';
import { mergeDocuments } from '../merge/merger.js';
import { createLeaf, findChild } from '../model/node.js';
import { resolvePath } from '../paths.js';
import { documentOf, named, names, pkg, sequence } from './fixtures.js';

function signal(name: string, identity: string) {
  return named('I-SIGNAL', name, [], { UUID: identity });
}

describe('mergeDocuments', () => {
  it('should merge every source, relocate references and repair identities', () => {
    const destination = documentOf('base.arxml', [pkg('Communication', [], undefined, 'base-comm')]);
    const a = documentOf('a.arxml', [pkg('Communication', [signal('S1', 'x')])]);
    const b = documentOf('b.arxml', [
      pkg('Communication', [
        signal('S2', 'x'),
        named('I-SIGNAL-GROUP', 'G', [createLeaf('I-SIGNAL-REF', '/Communication/S1', { DEST: 'I-SIGNAL' })]),
      ]),
    ]);

    const result = mergeDocuments(
      destination,
      [
        { doc: a, packages: [{ name: 'Communication' }] },
        { doc: b, packages: [{ name: 'Communication' }] },
      ],
      { generate: sequence() }
    );

    expect(result.success).toBe(true);
    expect(result.relocation).toEqual({ rewritten: 1, unmapped: [] });
    expect(result.identities.map(({ previous, next }) => ({ previous, next }))).toEqual([
      { previous: 'x', next: 'id-1' },
    ]);
    expect(resolvePath(destination, '/Communication/S2')?.attributes).toEqual({ UUID: 'id-1' });
    expect(resolvePath(destination, '/Communication/G')).toBeDefined();
  });

  it('should leave the sources untouched', () => {
    const destination = documentOf('base.arxml', []);
    const source = documentOf('a.arxml', [pkg('Communication', [signal('S1', 'x')])]);
    const original = resolvePath(source, '/Communication/S1');

    mergeDocuments(destination, [{ doc: source, packages: [{ name: 'Communication' }] }], { generate: sequence() });

    const merged = resolvePath(destination, '/Communication/S1');
    expect(merged).toBeDefined();
    expect(merged).not.toBe(original);
    expect(resolvePath(source, '/Communication/S1')).toBe(original);
    expect(original?.attributes).toEqual({ UUID: 'x' });
  });

  it('should leave the sources untouched when they are prefixed', () => {
    const destination = documentOf('base.arxml', []);
    const source = documentOf('a.arxml', [
      pkg('Communication', [
        signal('S1', 'x'),
        named('I-SIGNAL-GROUP', 'G', [createLeaf('I-SIGNAL-REF', '/Communication/S1')]),
      ]),
    ]);
    const prefix = { prefix: 'Eth', tag: 'I-SIGNAL', referenceTags: ['I-SIGNAL-REF'] };

    const result = mergeDocuments(destination, [{ doc: source, packages: [{ name: 'Communication' }], prefix }], {
      generate: sequence(),
    });

    expect(result.success).toBe(true);
    expect(resolvePath(destination, '/Communication/EthS1')?.attributes).toEqual({ UUID: 'id-1' });
    expect(resolvePath(source, '/Communication/S1')?.attributes).toEqual({ UUID: 'x' });
    expect(resolvePath(source, '/Communication/EthS1')).toBeUndefined();
    const group = resolvePath(source, '/Communication/G');
    expect(group && findChild(group, 'I-SIGNAL-REF')?.text).toBe('/Communication/S1');
  });

  it('should prefix the sources in place when cloning is off', () => {
    const destination = documentOf('base.arxml', []);
    const source = documentOf('a.arxml', [pkg('Communication', [signal('S1', 'x')])]);
    const prefix = { prefix: 'Eth', tag: 'I-SIGNAL', referenceTags: [] };

    mergeDocuments(destination, [{ doc: source, packages: [{ name: 'Communication' }], prefix }], {
      clone: false,
      generate: sequence(),
    });

    expect(resolvePath(source, '/Communication/EthS1')?.attributes).toEqual({ UUID: 'id-1' });
  });

  it('should fail on a strict clash without repairing identities', () => {
    const destination = documentOf('base.arxml', [pkg('Communication', [signal('S1', 'x')])]);
    const source = documentOf('a.arxml', [pkg('Communication', [signal('S1', 'x')])]);

    const result = mergeDocuments(destination, [
      { doc: source, packages: [{ name: 'Communication', graceful: ['Pdu'] }] },
    ]);

    expect(result.success).toBe(false);
    expect(result.clashes.anyStrictClash()).toBe(true);
    expect(result.identities).toEqual([]);
  });

  it('should fail when a required source package is missing', () => {
    const destination = documentOf('base.arxml', []);
    const source = documentOf('a.arxml', []);

    const result = mergeDocuments(destination, [{ doc: source, packages: [{ name: 'Signal' }] }]);

    expect(result.success).toBe(false);
    expect(result.clashes.missingSources).toEqual([{ pkg: 'Signal', source: 'a.arxml' }]);
  });

  it('should succeed with graceful clashes', () => {
    const destination = documentOf('base.arxml', [pkg('Communication', [signal('S1', 'x')])]);
    const source = documentOf('a.arxml', [pkg('Communication', [signal('S1', 'y'), signal('S2', 'z')])]);

    const result = mergeDocuments(destination, [{ doc: source, packages: [{ name: 'Communication' }] }]);

    expect(result.success).toBe(true);
    expect(result.clashes.anyGracefulClash()).toBe(true);
    const elements = findChild(destination.root.children[0].children[0], 'ELEMENTS');
    expect(elements && names(elements.children)).toEqual(['S1', 'S2']);
  });

  it('should prefix source elements before merging', () => {
    const destination = documentOf('base.arxml', [pkg('Communication', [signal('S1', 'x')])]);
    const source = documentOf('a.arxml', [
      pkg('Communication', [
        signal('S1', 'y'),
        named('I-SIGNAL-GROUP', 'G', [createLeaf('I-SIGNAL-REF', '/Communication/S1')]),
      ]),
    ]);

    const result = mergeDocuments(
      destination,
      [
        {
          doc: source,
          packages: [{ name: 'Communication', graceful: ['Pdu'] }],
          prefix: { prefix: 'Eth', tag: 'I-SIGNAL', referenceTags: ['I-SIGNAL-REF'] },
        },
      ],
      { generate: sequence() }
    );

    expect(result.success).toBe(true);
    const group = resolvePath(destination, '/Communication/G');
    expect(group && findChild(group, 'I-SIGNAL-REF')?.text).toBe('/Communication/EthS1');
    expect(resolvePath(destination, '/Communication/EthS1')?.attributes).toEqual({ UUID: 'id-1' });
  });

  it('should skip identity repair when disabled', () => {
    const destination = documentOf('base.arxml', [pkg('Communication', [signal('S1', 'x')])]);
    const source = documentOf('a.arxml', [pkg('Communication', [signal('S2', 'x')])]);

    const result = mergeDocuments(destination, [{ doc: source, packages: [{ name: 'Communication' }] }], {
      uniqueIdentities: false,
    });

    expect(result.identities).toEqual([]);
    expect(resolvePath(destination, '/Communication/S2')?.attributes).toEqual({ UUID: 'x' });
  });
});
