import { describe, it, expect } from 'vitest';
import { NameClashSet, formatClashes } from '../merge/clashes.js';

describe('NameClashSet', () => {
  it('should route events by mode', () => {
    const clashes = new NameClashSet();

    clashes.record({ mode: 'graceful', keys: ['S1'], sourceScope: '/A', destinationScope: '/B', source: 'a.arxml' });

    expect(clashes.anyGracefulClash()).toBe(true);
    expect(clashes.anyStrictClash()).toBe(false);
    expect(clashes.anyMissingSource()).toBe(false);
  });

  it('should start empty again after reset', () => {
    const clashes = new NameClashSet();
    clashes.record({ mode: 'strict', keys: ['S1'], sourceScope: '/A', destinationScope: '/B', source: 'a.arxml' });
    clashes.recordMissingSource({ pkg: 'Signal', source: 'a.arxml' });

    clashes.reset();

    expect(clashes.anyStrictClash()).toBe(false);
    expect(clashes.anyMissingSource()).toBe(false);
    expect(clashes.strict).toEqual([]);
  });
});

describe('formatClashes', () => {
  it('should list errors before warnings', () => {
    const clashes = new NameClashSet();
    clashes.record({ mode: 'graceful', keys: ['S1'], sourceScope: '/Src/Sig', destinationScope: '/Dst/Sig', source: 'b.arxml' });
    clashes.record({
      mode: 'strict',
      keys: ['P1', 'P2'],
      sourceScope: '/Src/Pdu',
      destinationScope: '/Dst/Pdu',
      source: 'a.arxml',
    });
    clashes.recordMissingSource({ pkg: 'Signal', source: 'b.arxml' });

    expect(formatClashes(clashes)).toBe(
      [
        'Errors:',
        '  - 2 name clash(es) between /Src/Pdu (a.arxml) and /Dst/Pdu: P1, P2',
        '  - Package "Signal" is missing in b.arxml',
        'Warnings:',
        '  - 1 name clash(es) between /Src/Sig (b.arxml) and /Dst/Sig: S1 (skipped)',
      ].join('\n')
    );
  });

  it('should return an empty string without clashes', () => {
    expect(formatClashes(new NameClashSet())).toBe('');
  });
});
