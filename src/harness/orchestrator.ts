/**
 * @file orchestrator.ts
 * @description One iteration of a compute test, from allocation to verdict.
 *
 * Order of operations:
 *   inputs (allocate, write, flush) -> outputs (allocate, zero, flush)
 *   -> binding layout, pool, set -> kernel, pipeline
 *   -> command unit -> submit and wait -> invalidate and compare.
 *
 * Every object goes through one ResourceScope, so each exit path, including a
 * timeout or a device failure halfway through, releases all of it.
 */
import { log } from '../debug/log';
import { DeviceInterface, ProgramBinary } from '../device/types';
import { TestStatus } from '../case/test-status';
import { TestSpecification, bindingCount } from '../spec/test-spec';
import { allocateBuffer, readBuffer, writeBuffer, zeroBuffer } from './buffer-resource';
import { buildBindingTable, createBindingPool, createBindingSet, createBindingSetLayout } from './binding-set';
import { createCommandPool, recordCommandUnit } from './command-sequencer';
import { loadKernel } from './kernel-loader';
import { buildExecutionUnit } from './pipeline-builder';
import { withResourceScope } from './resource-scope';
import { submitAndWait } from './submission';
import { MATCH_MESSAGE, MISMATCH_MESSAGE, verifyOutputs, verifyWith } from './verifier';

export interface RunOptions {
  /** null waits on the completion signal without bound. */
  waitTimeoutMs: number | null;
}

export async function runComputeTest(
  device: DeviceInterface,
  spec: TestSpecification,
  binary: ProgramBinary,
  options: RunOptions,
): Promise<TestStatus> {
  return withResourceScope(async (scope) => {
    const inputs = spec.inputs.map((data) => {
      const buffer = allocateBuffer(device, scope, data.numBytes);
      writeBuffer(device, buffer, data.bytes());
      return buffer;
    });
    const outputs = spec.outputs.map((data) => {
      const buffer = allocateBuffer(device, scope, data.numBytes);
      zeroBuffer(device, buffer, data.numBytes);
      return buffer;
    });

    const slotCount = bindingCount(spec);
    const table = buildBindingTable(inputs, outputs);
    const setLayout = createBindingSetLayout(device, scope, slotCount);
    const pool = createBindingPool(device, scope, slotCount);
    const bindingSet = createBindingSet(device, pool, setLayout, slotCount, table);

    const kernel = await loadKernel(device, scope, binary);
    const unit = await buildExecutionUnit(device, scope, kernel, setLayout);

    const commandPool = createCommandPool(device, scope);
    const commands = recordCommandUnit(device, scope, commandPool, unit, bindingSet, spec.dispatchDimensions);

    const state = await submitAndWait(device, scope, commands, { timeoutMs: options.waitTimeoutMs });
    if (state === 'timed-out') {
      return TestStatus.timeout(`Compute work did not complete within ${options.waitTimeoutMs}ms`);
    }

    const produced: Uint8Array[] = [];
    for (const output of outputs) produced.push(await readBuffer(device, output));

    const result = spec.verifyOutputs
      ? verifyWith(spec.verifyOutputs, spec.inputs, spec.outputs, produced)
      : verifyOutputs(spec.outputs, produced);
    if (!result.ok) {
      return TestStatus.fail(spec.failMessage ?? MISMATCH_MESSAGE);
    }
    log.debug('Orchestrator', `${outputs.length} output(s) verified`);
    return TestStatus.pass(MATCH_MESSAGE);
  });
}
