/**
 * @file reference-kernel.ts
 * @description Parser and interpreter for the reference device's kernel language.
 *
 * A module holds one or more `.kernel <name>` ... `.end` blocks. Each block is a
 * straight-line list of instructions over 32-bit words:
 *
 *   .kernel main
 *     .workgroup_size 1 1 1
 *     ld   r0, b0[gid]
 *     ld   r1, b1[gid]
 *     iadd r2, r0, r1
 *     st   b2[gid], r2
 *   .end
 *
 * Buffer indices are in words. Loads outside a binding read 0 and stores
 * outside a binding are dropped.
 */

export const REGISTER_COUNT = 16;

export type InvocationId =
  | 'gid' | 'gid.x' | 'gid.y' | 'gid.z'
  | 'lid.x' | 'lid.y' | 'lid.z'
  | 'wg.x' | 'wg.y' | 'wg.z';

const INVOCATION_IDS: readonly InvocationId[] = [
  'gid', 'gid.x', 'gid.y', 'gid.z', 'lid.x', 'lid.y', 'lid.z', 'wg.x', 'wg.y', 'wg.z',
];

export type Operand =
  | { kind: 'reg'; index: number }
  | { kind: 'imm'; value: number }
  | { kind: 'id'; id: InvocationId };

export interface BufferRef {
  binding: number;
  index: Operand;
}

export type IntOp = 'iadd' | 'isub' | 'imul' | 'and' | 'or' | 'xor' | 'shl' | 'shr';
export type FloatOp = 'fadd' | 'fsub' | 'fmul' | 'fdiv';
export type BinaryOp = IntOp | FloatOp;

const BINARY_OPS: readonly BinaryOp[] = ['iadd', 'isub', 'imul', 'and', 'or', 'xor', 'shl', 'shr', 'fadd', 'fsub', 'fmul', 'fdiv'];

export type Instruction =
  | { op: 'mov'; dst: number; src: Operand }
  | { op: 'fneg'; dst: number; src: Operand }
  | { op: BinaryOp; dst: number; a: Operand; b: Operand }
  | { op: 'ld'; dst: number; ref: BufferRef }
  | { op: 'st'; ref: BufferRef; src: Operand }
  | { op: 'ret' };

export interface KernelEntry {
  name: string;
  workgroupSize: [number, number, number];
  instructions: Instruction[];
  /** Highest binding number the entry touches, or -1. */
  maxBinding: number;
}

export interface KernelModule {
  entries: Map<string, KernelEntry>;
}

export class KernelSyntaxError extends Error {
  constructor(readonly line: number, message: string) {
    super(`line ${line}: ${message}`);
    this.name = 'KernelSyntaxError';
  }
}

// ------------------------------------------------------------------
// Parsing
// ------------------------------------------------------------------

const f32Scratch = new Float32Array(1);
const u32Scratch = new Uint32Array(f32Scratch.buffer);

export function f32ToBits(value: number): number {
  f32Scratch[0] = value;
  return u32Scratch[0];
}

export function bitsToF32(bits: number): number {
  u32Scratch[0] = bits;
  return f32Scratch[0];
}

function parseImmediate(text: string, line: number): number {
  if (text.startsWith('f:')) {
    const value = Number(text.slice(2));
    if (Number.isNaN(value) && text.slice(2).toLowerCase() !== 'nan') {
      throw new KernelSyntaxError(line, `Invalid float literal '${text}'`);
    }
    return f32ToBits(value);
  }
  if (/^0x[0-9a-f]+$/i.test(text) || /^-?\d+$/.test(text)) {
    const value = Number(text);
    if (value < -0x80000000 || value > 0xffffffff) {
      throw new KernelSyntaxError(line, `Immediate '${text}' does not fit in 32 bits`);
    }
    return value >>> 0;
  }
  throw new KernelSyntaxError(line, `Invalid operand '${text}'`);
}

function parseRegister(text: string, line: number): number {
  const match = /^r(\d+)$/.exec(text);
  if (!match) throw new KernelSyntaxError(line, `Expected register, got '${text}'`);
  const index = Number(match[1]);
  if (index >= REGISTER_COUNT) throw new KernelSyntaxError(line, `Register '${text}' out of range`);
  return index;
}

function isInvocationId(text: string): text is InvocationId {
  return INVOCATION_IDS.some(id => id === text);
}

function parseOperand(text: string, line: number): Operand {
  if (/^r\d+$/.test(text)) return { kind: 'reg', index: parseRegister(text, line) };
  if (isInvocationId(text)) return { kind: 'id', id: text };
  return { kind: 'imm', value: parseImmediate(text, line) };
}

function parseBufferRef(text: string, line: number): BufferRef {
  const match = /^b(\d+)\[(.+)\]$/.exec(text);
  if (!match) throw new KernelSyntaxError(line, `Expected buffer reference, got '${text}'`);
  return { binding: Number(match[1]), index: parseOperand(match[2].trim(), line) };
}

function isBinaryOp(op: string): op is BinaryOp {
  return BINARY_OPS.some(candidate => candidate === op);
}

function expectArity(operands: string[], count: number, op: string, line: number) {
  if (operands.length !== count) {
    throw new KernelSyntaxError(line, `'${op}' takes ${count} operand(s), got ${operands.length}`);
  }
}

function parseInstruction(op: string, operands: string[], line: number): Instruction {
  if (op === 'ret') {
    expectArity(operands, 0, op, line);
    return { op };
  }
  if (op === 'mov' || op === 'fneg') {
    expectArity(operands, 2, op, line);
    return { op, dst: parseRegister(operands[0], line), src: parseOperand(operands[1], line) };
  }
  if (op === 'ld') {
    expectArity(operands, 2, op, line);
    return { op, dst: parseRegister(operands[0], line), ref: parseBufferRef(operands[1], line) };
  }
  if (op === 'st') {
    expectArity(operands, 2, op, line);
    return { op, ref: parseBufferRef(operands[0], line), src: parseOperand(operands[1], line) };
  }
  if (isBinaryOp(op)) {
    expectArity(operands, 3, op, line);
    return {
      op,
      dst: parseRegister(operands[0], line),
      a: parseOperand(operands[1], line),
      b: parseOperand(operands[2], line),
    };
  }
  throw new KernelSyntaxError(line, `Unknown instruction '${op}'`);
}

export function parseKernelModule(source: string): KernelModule {
  const entries = new Map<string, KernelEntry>();
  let current: KernelEntry | null = null;

  const lines = source.split(/\r?\n/);
  for (let i = 0; i < lines.length; i++) {
    const line = i + 1;
    const text = lines[i].replace(/;.*$/, '').trim();
    if (!text) continue;

    const [head, ...rest] = text.split(/\s+/);
    const tail = text.slice(head.length).trim();

    if (head === '.kernel') {
      if (current) throw new KernelSyntaxError(line, `Nested .kernel inside '${current.name}'`);
      if (rest.length !== 1) throw new KernelSyntaxError(line, '.kernel takes exactly one name');
      if (entries.has(rest[0])) throw new KernelSyntaxError(line, `Duplicate kernel '${rest[0]}'`);
      current = { name: rest[0], workgroupSize: [1, 1, 1], instructions: [], maxBinding: -1 };
      continue;
    }
    if (head === '.end') {
      if (!current) throw new KernelSyntaxError(line, '.end without .kernel');
      entries.set(current.name, current);
      current = null;
      continue;
    }
    if (!current) throw new KernelSyntaxError(line, `'${head}' outside of a kernel`);

    if (head === '.workgroup_size') {
      const dims = rest.map(Number);
      if (dims.length !== 3 || dims.some(d => !Number.isInteger(d) || d < 1)) {
        throw new KernelSyntaxError(line, '.workgroup_size takes three positive integers');
      }
      current.workgroupSize = [dims[0], dims[1], dims[2]];
      continue;
    }

    const operands = tail ? tail.split(',').map(s => s.trim()) : [];
    const inst = parseInstruction(head, operands, line);
    if (inst.op === 'ld' || inst.op === 'st') {
      current.maxBinding = Math.max(current.maxBinding, inst.ref.binding);
    }
    current.instructions.push(inst);
  }

  if (current !== null) {
    throw new KernelSyntaxError(lines.length, 'Unterminated .kernel block');
  }
  return { entries };
}

// ------------------------------------------------------------------
// Execution
// ------------------------------------------------------------------

export interface KernelMemory {
  load(binding: number, index: number): number;
  store(binding: number, index: number, value: number): void;
}

interface Invocation {
  gid: [number, number, number];
  lid: [number, number, number];
  wg: [number, number, number];
  flat: number;
}

function readId(id: InvocationId, inv: Invocation): number {
  switch (id) {
    case 'gid': return inv.flat;
    case 'gid.x': return inv.gid[0];
    case 'gid.y': return inv.gid[1];
    case 'gid.z': return inv.gid[2];
    case 'lid.x': return inv.lid[0];
    case 'lid.y': return inv.lid[1];
    case 'lid.z': return inv.lid[2];
    case 'wg.x': return inv.wg[0];
    case 'wg.y': return inv.wg[1];
    case 'wg.z': return inv.wg[2];
  }
}

function evalBinary(op: BinaryOp, a: number, b: number): number {
  switch (op) {
    case 'iadd': return (a + b) >>> 0;
    case 'isub': return (a - b) >>> 0;
    case 'imul': return Math.imul(a, b) >>> 0;
    case 'and': return (a & b) >>> 0;
    case 'or': return (a | b) >>> 0;
    case 'xor': return (a ^ b) >>> 0;
    case 'shl': return (a << (b & 31)) >>> 0;
    case 'shr': return a >>> (b & 31);
    case 'fadd': return f32ToBits(bitsToF32(a) + bitsToF32(b));
    case 'fsub': return f32ToBits(bitsToF32(a) - bitsToF32(b));
    case 'fmul': return f32ToBits(bitsToF32(a) * bitsToF32(b));
    case 'fdiv': return f32ToBits(bitsToF32(a) / bitsToF32(b));
  }
}

function runInvocation(entry: KernelEntry, inv: Invocation, memory: KernelMemory) {
  const regs = new Uint32Array(REGISTER_COUNT);
  const value = (operand: Operand): number => {
    switch (operand.kind) {
      case 'reg': return regs[operand.index];
      case 'imm': return operand.value;
      case 'id': return readId(operand.id, inv);
    }
  };

  for (const inst of entry.instructions) {
    switch (inst.op) {
      case 'ret':
        return;
      case 'mov':
        regs[inst.dst] = value(inst.src);
        break;
      case 'fneg':
        regs[inst.dst] = f32ToBits(-bitsToF32(value(inst.src)));
        break;
      case 'ld':
        regs[inst.dst] = memory.load(inst.ref.binding, value(inst.ref.index));
        break;
      case 'st':
        memory.store(inst.ref.binding, value(inst.ref.index), value(inst.src));
        break;
      default:
        regs[inst.dst] = evalBinary(inst.op, value(inst.a), value(inst.b));
    }
  }
}

/**
 * Runs every invocation of a `groups` dispatch, work-group by work-group.
 */
export function runKernel(entry: KernelEntry, groups: [number, number, number], memory: KernelMemory): void {
  const [sx, sy, sz] = entry.workgroupSize;
  const width = groups[0] * sx;
  const height = groups[1] * sy;

  for (let wz = 0; wz < groups[2]; wz++) {
    for (let wy = 0; wy < groups[1]; wy++) {
      for (let wx = 0; wx < groups[0]; wx++) {
        for (let lz = 0; lz < sz; lz++) {
          for (let ly = 0; ly < sy; ly++) {
            for (let lx = 0; lx < sx; lx++) {
              const gid: [number, number, number] = [wx * sx + lx, wy * sy + ly, wz * sz + lz];
              runInvocation(entry, {
                gid,
                lid: [lx, ly, lz],
                wg: [wx, wy, wz],
                flat: gid[0] + gid[1] * width + gid[2] * width * height,
              }, memory);
            }
          }
        }
      }
    }
  }
}
