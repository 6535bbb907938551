import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import { tmpdir } from 'os';
import { loadPlan, parsePlan, PlanError } from '../plan.js';

async function createTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(tmpdir(), 'netmerge-plan-'));
}

describe('parsePlan', () => {
  it('should resolve file paths against the base directory', () => {
    const plan = parsePlan(
      {
        destination: 'base.arxml',
        output: 'out/merged.arxml',
        sources: [{ file: 'sources/a.arxml', packages: [{ name: 'Communication' }] }],
      },
      '/work/plan.json',
      '/work'
    );

    expect(plan.destination).toBe(path.resolve('/work', 'base.arxml'));
    expect(plan.output).toBe(path.resolve('/work', 'out/merged.arxml'));
    expect(plan.sources[0].file).toBe(path.resolve('/work', 'sources/a.arxml'));
  });

  it('should apply defaults', () => {
    const plan = parsePlan(
      {
        destination: 'base.arxml',
        sources: [
          {
            file: 'a.arxml',
            packages: [{ name: 'Communication' }],
            prefix: { prefix: 'Eth', tag: 'I-SIGNAL' },
          },
        ],
      },
      'plan.json',
      '/work'
    );

    expect(plan.output).toBeUndefined();
    expect(plan.uniqueIdentities).toBe(true);
    expect(plan.onDuplicateSourceKey).toBe('error');
    expect(plan.sources[0].prefix).toEqual({ prefix: 'Eth', tag: 'I-SIGNAL', referenceTags: [] });
  });

  it('should report every invalid field with its path', () => {
    try {
      parsePlan({ destination: '', sources: [] }, 'plan.json', '/work');
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(PlanError);
      if (err instanceof PlanError) {
        expect(err.issues.map(issue => issue.path)).toEqual(['destination', 'sources']);
        expect(err.message.startsWith('Invalid merge plan plan.json:\n  - destination: ')).toBe(true);
      }
    }
  });

  it('should reject prefix rules naming non-reference tags', () => {
    const data = {
      destination: 'base.arxml',
      sources: [
        {
          file: 'a.arxml',
          packages: [{ name: 'Communication' }],
          prefix: { prefix: 'Eth', tag: 'I-SIGNAL', referenceTags: ['SHORT-NAME'] },
        },
      ],
    };

    expect(() => parsePlan(data, 'plan.json', '/work')).toThrow(
      'sources.0.prefix.referenceTags.0: must be a reference tag (-REF or -TREF)'
    );
  });
});

describe('loadPlan', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await createTempDir();
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('should read a plan relative to its own directory', async () => {
    const planFile = path.join(tempDir, 'plan.json');
    await fs.writeFile(
      planFile,
      JSON.stringify({ destination: 'base.arxml', sources: [{ file: 'a.arxml', packages: [{ name: 'Pdu' }] }] })
    );

    const plan = await loadPlan(planFile);

    expect(plan.destination).toBe(path.join(tempDir, 'base.arxml'));
    expect(plan.sources[0].file).toBe(path.join(tempDir, 'a.arxml'));
  });

  it('should report malformed JSON', async () => {
    const planFile = path.join(tempDir, 'plan.json');
    await fs.writeFile(planFile, '{ "destination": ');

    await expect(loadPlan(planFile)).rejects.toBeInstanceOf(PlanError);
    await expect(loadPlan(planFile)).rejects.toThrow('(json): ');
  });

  it('should report missing files', async () => {
    await expect(loadPlan(path.join(tempDir, 'missing.json'))).rejects.toThrow('(file): ');
  });
});
