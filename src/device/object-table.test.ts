import { describe, it, expect } from 'vitest';
import { DeviceError } from '../errors/harness-error';
import { ObjectTable } from './object-table';
import { makeHandle } from './types';

describe('ObjectTable', () => {
  it('shares one id sequence across tables', () => {
    const ids = { next: 1 };
    const buffers = new ObjectTable<'buffer', string>('buffer', ids);
    const kernels = new ObjectTable<'kernel', string>('kernel', ids);
    expect(buffers.add('a')).toEqual({ kind: 'buffer', id: 1 });
    expect(kernels.add('b')).toEqual({ kind: 'kernel', id: 2 });
    expect(buffers.add('c')).toEqual({ kind: 'buffer', id: 3 });
  });

  it('fails lookups of deleted handles', () => {
    const table = new ObjectTable<'buffer', string>('buffer', { next: 1 });
    const handle = table.add('a');
    expect(table.delete(handle, 'destroyBuffer')).toBe('a');
    expect(table.size).toBe(0);
    expect(() => table.get(handle, 'destroyBuffer')).toThrow(DeviceError);
    expect(() => table.get(makeHandle('buffer', 99), 'mapMemory')).toThrow('mapMemory failed (invalid-argument): unknown buffer #99');
  });
});
