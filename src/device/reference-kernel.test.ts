import { describe, it, expect } from 'vitest';
import { KernelMemory, KernelSyntaxError, bitsToF32, f32ToBits, parseKernelModule, runKernel } from './reference-kernel';

function memoryOf(buffers: number[][]): KernelMemory & { buffers: number[][] } {
  return {
    buffers,
    load: (binding, index) => buffers[binding]?.[index] ?? 0,
    store: (binding, index, value) => {
      const target = buffers[binding];
      if (target && index < target.length) target[index] = value;
    },
  };
}

function entryOf(source: string, name = 'main') {
  const entry = parseKernelModule(source).entries.get(name);
  if (!entry) throw new Error(`no entry ${name}`);
  return entry;
}

describe('Reference Kernel', () => {
  describe('parsing', () => {
    it('reads directives, comments and operands', () => {
      const entry = entryOf(`
        ; header comment
        .kernel main
          .workgroup_size 8 2 1
          ld   r3, b2[gid.x]   ; trailing comment
          iadd r4, r3, 0x10
          st   b5[lid.y], r4
        .end
      `);
      expect(entry.workgroupSize).toEqual([8, 2, 1]);
      expect(entry.maxBinding).toBe(5);
      expect(entry.instructions).toEqual([
        { op: 'ld', dst: 3, ref: { binding: 2, index: { kind: 'id', id: 'gid.x' } } },
        { op: 'iadd', dst: 4, a: { kind: 'reg', index: 3 }, b: { kind: 'imm', value: 16 } },
        { op: 'st', ref: { binding: 5, index: { kind: 'id', id: 'lid.y' } }, src: { kind: 'reg', index: 4 } },
      ]);
    });

    it('keeps several entry points apart', () => {
      const module = parseKernelModule('.kernel a\nret\n.end\n.kernel b\n.end');
      expect([...module.entries.keys()]).toEqual(['a', 'b']);
      expect(module.entries.get('b')?.maxBinding).toBe(-1);
    });

    it('encodes negative and float immediates as 32-bit patterns', () => {
      const entry = entryOf('.kernel main\nmov r0, -1\nmov r1, f:1.5\n.end');
      expect(entry.instructions).toEqual([
        { op: 'mov', dst: 0, src: { kind: 'imm', value: 0xffffffff } },
        { op: 'mov', dst: 1, src: { kind: 'imm', value: 0x3fc00000 } },
      ]);
    });

    it.each([
      ['.kernel main\nfoo r0\n.end', "line 2: Unknown instruction 'foo'"],
      ['.kernel main\nmov r16, 1\n.end', "line 2: Register 'r16' out of range"],
      ['.kernel main\niadd r0, r1\n.end', "line 2: 'iadd' takes 3 operand(s), got 2"],
      ['.kernel main\nmov r0, 0x100000000\n.end', "line 2: Immediate '0x100000000' does not fit in 32 bits"],
      ['.kernel main\nld r0, x[0]\n.end', "line 2: Expected buffer reference, got 'x[0]'"],
      ['.kernel main\n.kernel inner\n.end', "line 2: Nested .kernel inside 'main'"],
      ['.kernel a\n.end\n.kernel a\n.end', "line 3: Duplicate kernel 'a'"],
      ['ret', "line 1: 'ret' outside of a kernel"],
      ['.end', 'line 1: .end without .kernel'],
      ['.kernel main\n.workgroup_size 0 1 1\n.end', 'line 2: .workgroup_size takes three positive integers'],
      ['.kernel main\nret', 'line 2: Unterminated .kernel block'],
    ])('rejects %j', (source, message) => {
      expect(() => parseKernelModule(source)).toThrow(KernelSyntaxError);
      expect(() => parseKernelModule(source)).toThrow(message);
    });
  });

  describe('execution', () => {
    it('numbers invocations with a flat global index', () => {
      const entry = entryOf('.kernel main\n.workgroup_size 2 2 1\nst b0[gid], gid.y\n.end');
      const memory = memoryOf([new Array(8).fill(99)]);
      runKernel(entry, [2, 1, 1], memory);
      // width 4: row 0 is gid 0..3, row 1 is gid 4..7
      expect(memory.buffers[0]).toEqual([0, 0, 0, 0, 1, 1, 1, 1]);
    });

    it('wraps integer arithmetic to 32 bits', () => {
      const entry = entryOf(`
        .kernel main
          iadd r0, 0xffffffff, 2
          imul r1, 0x10000, 0x10000
          isub r2, 0, 1
          shl  r3, 1, 33
          shr  r4, 0x80000000, 31
          xor  r5, 0xff, 0x0f
          st b0[0], r0
          st b0[1], r1
          st b0[2], r2
          st b0[3], r3
          st b0[4], r4
          st b0[5], r5
        .end
      `);
      const memory = memoryOf([new Array(6).fill(0)]);
      runKernel(entry, [1, 1, 1], memory);
      expect(memory.buffers[0]).toEqual([1, 0, 0xffffffff, 2, 1, 0xf0]);
    });

    it('does float arithmetic on bit patterns', () => {
      const entry = entryOf('.kernel main\nld r0, b0[0]\nfdiv r1, r0, f:4\nfneg r2, r1\nst b0[1], r2\n.end');
      const memory = memoryOf([[f32ToBits(10), 0]]);
      runKernel(entry, [1, 1, 1], memory);
      expect(bitsToF32(memory.buffers[0][1])).toBe(-2.5);
    });

    it('stops an invocation at ret', () => {
      const entry = entryOf('.kernel main\nst b0[0], 1\nret\nst b0[1], 1\n.end');
      const memory = memoryOf([[0, 0]]);
      runKernel(entry, [1, 1, 1], memory);
      expect(memory.buffers[0]).toEqual([1, 0]);
    });

    it('runs nothing for an empty dispatch', () => {
      const entry = entryOf('.kernel main\nst b0[0], 1\n.end');
      const memory = memoryOf([[0]]);
      runKernel(entry, [0, 4, 4], memory);
      expect(memory.buffers[0]).toEqual([0]);
    });
  });
});
