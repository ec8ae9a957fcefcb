import { ProgramNotFoundError } from '../errors/harness-error';
import { log } from '../debug/log';
import { ProgramBinary, ProgramFormat } from '../device/types';

/** Symbolic name under which a case registers its kernel. */
export const COMPUTE_PROGRAM_NAME = 'compute';

export interface ProgramSource {
  name: string;
  source: string;
}

export class SourceCollection {
  private readonly sources = new Map<string, string>();

  add(name: string, source: string): this {
    this.sources.set(name, source);
    return this;
  }

  *[Symbol.iterator](): IterableIterator<ProgramSource> {
    for (const [name, source] of this.sources) yield { name, source };
  }
}

export class BinaryCollection {
  private readonly binaries = new Map<string, ProgramBinary>();

  set(binary: ProgramBinary): void {
    this.binaries.set(binary.name, binary);
  }

  get(name: string): ProgramBinary {
    const binary = this.binaries.get(name);
    if (!binary) throw new ProgramNotFoundError(name);
    return binary;
  }

  get size(): number {
    return this.binaries.size;
  }
}

/** Turns one source into a binary for a device's program format. */
export interface ProgramBuilder {
  readonly format: ProgramFormat;
  build(program: ProgramSource): ProgramBinary;
}

/**
 * Pass-through builder for devices that consume program text directly.
 */
export function textProgramBuilder(format: ProgramFormat): ProgramBuilder {
  const encoder = new TextEncoder();
  return {
    format,
    build: ({ name, source }) => ({ name, format, bytes: encoder.encode(source) }),
  };
}

export function buildPrograms(sources: SourceCollection, builder: ProgramBuilder): BinaryCollection {
  const binaries = new BinaryCollection();
  for (const program of sources) {
    binaries.set(builder.build(program));
    log.debug('Programs', `Built '${program.name}' as ${builder.format}`);
  }
  return binaries;
}
