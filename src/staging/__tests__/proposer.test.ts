/**
 * Tests for EditProposer and its parsing helpers.
 */

import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import {
  DETERMINISTIC_RATIONALE,
  EditProposer,
  applySimpleInstruction,
  parseProducedChanges,
  type EditProducer,
} from '../proposer.js';
import { PatchSystem } from '../../patch/system.js';

describe('parseProducedChanges', () => {
  it('extracts the outermost object from surrounding text', () => {
    const text = 'Here you go:\n{"changes": {"a.txt": "x\\n"}, "rationale": "fix it"}\nDone.';

    expect(parseProducedChanges(text)).toEqual({
      changes: { 'a.txt': 'x\n' },
      rationale: 'fix it',
    });
  });

  it('treats missing changes as empty', () => {
    expect(parseProducedChanges('{"rationale": ""}')).toEqual({ changes: {} });
  });

  it('returns null without a usable object', () => {
    expect(parseProducedChanges('no json here')).toBeNull();
    expect(parseProducedChanges('{ broken')).toBeNull();
    expect(parseProducedChanges('{"changes": {"a.txt": 3}}')).toBeNull();
  });
});

describe('applySimpleInstruction', () => {
  const files = [
    { path: 'a.txt', content: 'hello world\nhello\n' },
    { path: 'b.txt', content: 'no newline' },
    { path: 'new.txt', content: '' },
  ];

  it('replaces every occurrence literally', () => {
    expect(applySimpleInstruction("Replace 'hello' -> '$&'", files)).toEqual({
      'a.txt': '$& world\n$&\n',
    });
  });

  it('appends on a new line', () => {
    expect(applySimpleInstruction("append 'END'", files)).toEqual({
      'a.txt': 'hello world\nhello\nEND\n',
      'b.txt': 'no newline\nEND\n',
      'new.txt': 'END\n',
    });
  });

  it('prepends a line', () => {
    expect(applySimpleInstruction("PREPEND 'TOP'", files)).toEqual({
      'a.txt': 'TOP\nhello world\nhello\n',
      'b.txt': 'TOP\nno newline',
      'new.txt': 'TOP\n',
    });
  });

  it('returns nothing for other instructions', () => {
    expect(applySimpleInstruction('make it better', files)).toEqual({});
  });
});

describe('EditProposer', () => {
  let root: string;
  let patchSystem: PatchSystem;

  beforeEach(async () => {
    root = await fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), 'proposer-test-')));
    patchSystem = new PatchSystem({ root });
    await fs.writeFile(path.join(root, 'a.txt'), 'alpha\n');
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it('uses deterministic transforms without a producer', async () => {
    const proposer = new EditProposer(patchSystem);

    const edit = await proposer.propose("replace 'alpha' -> 'beta'", ['a.txt']);

    expect(edit?.instruction).toBe("replace 'alpha' -> 'beta'");
    expect(edit?.proposal.rationale).toBe(DETERMINISTIC_RATIONALE);
    expect(edit?.proposal.newContents).toEqual({ 'a.txt': 'beta\n' });
    expect(edit?.proposal.affectedFiles).toEqual(['a.txt']);
    expect(await fs.readFile(path.join(root, 'a.txt'), 'utf-8')).toBe('alpha\n');
  });

  it('passes file contents to the producer and uses its changes', async () => {
    const producer = jest
      .fn<EditProducer>()
      .mockResolvedValue('{"changes": {"a.txt": "gamma\\n"}, "rationale": "model says so"}');
    const proposer = new EditProposer(patchSystem, { producer });

    const edit = await proposer.propose('use gamma', ['a.txt', '../escape.txt']);

    expect(producer).toHaveBeenCalledWith({
      instruction: 'use gamma',
      files: [{ path: 'a.txt', content: 'alpha\n' }],
    });
    expect(edit?.proposal.newContents).toEqual({ 'a.txt': 'gamma\n' });
    expect(edit?.proposal.rationale).toBe('model says so');
  });

  it('falls back to transforms when the producer yields nothing', async () => {
    const onDebug = jest.fn();
    const producer = jest.fn<EditProducer>().mockResolvedValue('sorry, no can do');
    const proposer = new EditProposer(patchSystem, { producer, callbacks: { onDebug } });

    const edit = await proposer.propose("append 'omega'", ['a.txt']);

    expect(edit?.proposal.newContents).toEqual({ 'a.txt': 'alpha\nomega\n' });
    expect(edit?.proposal.rationale).toBe(DETERMINISTIC_RATIONALE);
    expect(onDebug).toHaveBeenCalledWith('Producer output held no usable changes object');
  });

  it('returns null when nothing would change', async () => {
    const proposer = new EditProposer(patchSystem);

    expect(await proposer.propose("replace 'zeta' -> 'eta'", ['a.txt'])).toBeNull();
    expect(await proposer.propose('tidy up', ['a.txt'])).toBeNull();
  });

  it('treats missing files as empty', async () => {
    const proposer = new EditProposer(patchSystem);

    const edit = await proposer.propose("prepend 'first line'", ['fresh.txt']);

    expect(edit?.proposal.newContents).toEqual({ 'fresh.txt': 'first line\n' });
    expect(edit?.proposal.estimatedImpact).toEqual({
      filesChanged: 1,
      linesAdded: 1,
      linesRemoved: 0,
    });
  });
});
