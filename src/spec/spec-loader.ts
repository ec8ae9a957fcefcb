/**
 * @file spec-loader.ts
 * @description Declarative compute cases as JSON documents.
 *
 * {
 *   "name": "copy",
 *   "kernel": ".kernel main\n ld r0, b0[gid]\n st b1[gid], r0\n.end",
 *   "inputs":  [{ "type": "uint32", "values": [1, 2, 3, 4] }],
 *   "outputs": [{ "type": "uint32", "values": [1, 2, 3, 4] }],
 *   "dispatch": [4, 1, 1]
 * }
 */
import * as fs from 'fs';
import { z } from 'zod';
import { SpecificationError } from '../errors/harness-error';
import { ComputeShaderCase } from '../case/compute-shader-case';
import { BufferData } from './buffer-data';
import { createTestSpecification } from './test-spec';

const int = z.number().int();

export const BufferJsonSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('bytes'), values: z.array(int.min(0).max(0xff)) }),
  z.object({ type: z.literal('uint32'), values: z.array(int.min(0).max(0xffffffff)) }),
  z.object({ type: z.literal('int32'), values: z.array(int.min(-0x80000000).max(0x7fffffff)) }),
  z.object({ type: z.literal('float32'), values: z.array(z.number()) }),
]);
export type BufferJson = z.infer<typeof BufferJsonSchema>;

export const CaseJsonSchema = z.object({
  name: z.string().min(1),
  description: z.string().optional(),
  kernel: z.union([z.string(), z.array(z.string())]),
  inputs: z.array(BufferJsonSchema).default([]),
  outputs: z.array(BufferJsonSchema),
  dispatch: z.tuple([int.nonnegative(), int.nonnegative(), int.nonnegative()]),
});
export type CaseJson = z.infer<typeof CaseJsonSchema>;

export function bufferFromJson(json: BufferJson): BufferData {
  switch (json.type) {
    case 'bytes': return BufferData.fromBytes(json.values);
    case 'uint32': return BufferData.fromUint32(json.values);
    case 'int32': return BufferData.fromInt32(json.values);
    case 'float32': return BufferData.fromFloat32(json.values);
  }
}

/** Validates `input` and turns it into a runnable case. */
export function parseCase(input: unknown, origin = '<inline>'): ComputeShaderCase {
  const result = CaseJsonSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map(i => `${i.path.join('.') || '<root>'}: ${i.message}`);
    throw new SpecificationError(`Invalid case in ${origin}:\n${issues.map(i => `  - ${i}`).join('\n')}`);
  }
  const json = result.data;
  const spec = createTestSpecification({
    kernelSource: Array.isArray(json.kernel) ? json.kernel.join('\n') : json.kernel,
    inputs: json.inputs.map(bufferFromJson),
    outputs: json.outputs.map(bufferFromJson),
    dispatchDimensions: json.dispatch,
  });
  return new ComputeShaderCase(json.name, json.description ?? '', spec);
}

export function loadCaseFile(filePath: string): ComputeShaderCase {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf8'));
  } catch (err) {
    throw new SpecificationError(`Cannot read case file ${filePath}: ${err instanceof Error ? err.message : String(err)}`, { cause: err });
  }
  return parseCase(raw, filePath);
}
