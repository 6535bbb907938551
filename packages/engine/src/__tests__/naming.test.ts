import { describe, it, expect } from 'vitest';
import {
  prefixDocumentElements,
  prefixElementsOfType,
  prefixName,
  prefixReferencesOfType,
} from '../merge/naming.js';
import { createLeaf, localName } from '../model/node.js';
import { InvalidReferenceTagError } from '../errors.js';
import { documentOf, named, pkg, sequence } from './fixtures.js';

describe('prefixName', () => {
  it('should concatenate prefix and name', () => {
    expect(prefixName('Eth', 'Speed')).toBe('EthSpeed');
  });
});

describe('prefixElementsOfType', () => {
  it('should rename matching elements and give them new identities', () => {
    const speed = named('SENDER-RECEIVER-INTERFACE', 'Speed', [], { UUID: 'u1' });
    const signal = named('I-SIGNAL', 'Speed');
    const doc = documentOf('src.arxml', [pkg('Interfaces', [speed, signal])]);

    const renamed = prefixElementsOfType(doc.root, 'Eth', 'SENDER-RECEIVER-INTERFACE', sequence());

    expect(renamed).toEqual([speed]);
    expect(localName(speed)).toBe('EthSpeed');
    expect(speed.attributes.UUID).toBe('id-1');
    expect(localName(signal)).toBe('Speed');
  });

  it('should rename elements without identities and leave them without one', () => {
    const speed = named('SENDER-RECEIVER-INTERFACE', 'Speed');
    const doc = documentOf('src.arxml', [pkg('Interfaces', [speed])]);

    prefixElementsOfType(doc.root, 'Eth', 'SENDER-RECEIVER-INTERFACE', sequence());

    expect(localName(speed)).toBe('EthSpeed');
    expect(speed.attributes).toEqual({});
  });
});

describe('prefixReferencesOfType', () => {
  function holder(...refs: Array<[string, string]>) {
    return named('HOLDER', 'H', refs.map(([tag, text]) => createLeaf(tag, text)));
  }

  it('should prefix the third segment of data element references', () => {
    const root = holder(['DATA-ELEMENT-REF', '/Ports/Speed/Value']);

    prefixReferencesOfType(root, 'Eth', 'DATA-ELEMENT-REF');

    expect(root.children[1].text).toBe('/Ports/Speed/EthValue');
  });

  it('should prefix the second segment of interface references', () => {
    const root = holder(['REQUIRED-INTERFACE-TREF', '/Interfaces/Speed/Extra']);

    prefixReferencesOfType(root, 'Eth', 'REQUIRED-INTERFACE-TREF');

    expect(root.children[1].text).toBe('/Interfaces/EthSpeed/Extra');
  });

  it('should prefix the last segment of other references', () => {
    const root = holder(['I-SIGNAL-REF', '/Communication/Signals/S1']);

    prefixReferencesOfType(root, 'Eth', 'I-SIGNAL-REF');

    expect(root.children[1].text).toBe('/Communication/Signals/EthS1');
  });

  it('should skip references too short to hold the prefixed segment', () => {
    const root = holder(['DATA-ELEMENT-REF', '/Ports/Speed'], ['DATA-ELEMENT-REF', '/Ports/Speed/Value']);

    const rewritten = prefixReferencesOfType(root, 'Eth', 'DATA-ELEMENT-REF');

    expect(rewritten).toEqual([root.children[2]]);
    expect(root.children[1].text).toBe('/Ports/Speed');
  });

  it('should apply the filter', () => {
    const root = holder(['I-SIGNAL-REF', '/A/S1'], ['I-SIGNAL-REF', '/B/S2']);

    prefixReferencesOfType(root, 'Eth', 'I-SIGNAL-REF', ref => ref.text?.startsWith('/B') ?? false);

    expect(root.children.slice(1).map(ref => ref.text)).toEqual(['/A/S1', '/B/EthS2']);
  });

  it('should reject tags that are not references', () => {
    expect(() => prefixReferencesOfType(holder(), 'Eth', 'SHORT-NAME')).toThrow(InvalidReferenceTagError);
  });
});

describe('prefixDocumentElements', () => {
  it('should rename elements and the references to them', () => {
    const doc = documentOf('src.arxml', [
      pkg('Interfaces', [named('SENDER-RECEIVER-INTERFACE', 'Speed', [], { UUID: 'u1' })]),
      pkg('Ports', [
        named('R-PORT-PROTOTYPE', 'SpeedIn', [createLeaf('REQUIRED-INTERFACE-TREF', '/Interfaces/Speed')]),
        named('P-PORT-PROTOTYPE', 'SpeedOut', [createLeaf('PROVIDED-INTERFACE-TREF', '/Interfaces/Speed')]),
      ]),
    ]);

    const counts = prefixDocumentElements(
      doc,
      'Eth',
      'SENDER-RECEIVER-INTERFACE',
      ['REQUIRED-INTERFACE-TREF', 'PROVIDED-INTERFACE-TREF'],
      sequence()
    );

    expect(counts).toEqual({ elements: 1, references: 2 });
  });
});
