import { describe, it, expect } from 'vitest';
import { ProgramNotFoundError } from '../errors/harness-error';
import { BinaryCollection, COMPUTE_PROGRAM_NAME, SourceCollection, buildPrograms, textProgramBuilder } from './program-collection';

describe('Program Collections', () => {
  it('builds every source with the given builder', () => {
    const sources = new SourceCollection().add(COMPUTE_PROGRAM_NAME, 'abc').add('helper', 'é');
    const binaries = buildPrograms(sources, textProgramBuilder('wgsl'));

    expect(binaries.size).toBe(2);
    const compute = binaries.get('compute');
    expect(compute.format).toBe('wgsl');
    expect([...compute.bytes]).toEqual([0x61, 0x62, 0x63]);
    expect([...binaries.get('helper').bytes]).toEqual([0xc3, 0xa9]);
  });

  it('replaces a source added twice under one name', () => {
    const sources = new SourceCollection().add('compute', 'old').add('compute', 'new');
    expect([...sources]).toEqual([{ name: 'compute', source: 'new' }]);
  });

  it('throws for a program that was never built', () => {
    const binaries = new BinaryCollection();
    expect(() => binaries.get('compute')).toThrow(ProgramNotFoundError);
    expect(() => binaries.get('compute')).toThrow("Program 'compute' not found in binary collection");
  });
});
