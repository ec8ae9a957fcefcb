import { BindingLayoutHandle, DeviceInterface, KernelHandle, PipelineHandle, PipelineLayoutHandle } from '../device/types';
import { ResourceScope } from './resource-scope';

export interface ExecutionUnit {
  readonly kernel: KernelHandle;
  readonly layout: PipelineLayoutHandle;
  readonly pipeline: PipelineHandle;
}

/**
 * Single set layout, no push constants, no pipeline cache, no base pipeline.
 * Always builds fresh objects.
 */
export async function buildExecutionUnit(
  device: DeviceInterface,
  scope: ResourceScope,
  kernel: KernelHandle,
  setLayout: BindingLayoutHandle,
): Promise<ExecutionUnit> {
  const layout = scope.own(
    'pipeline layout',
    device.createPipelineLayout({ setLayouts: [setLayout], pushConstantRanges: [] }),
    l => device.destroyPipelineLayout(l),
  );
  const pipeline = await device.createComputePipeline({ kernel, layout, cache: null, basePipeline: null });
  scope.own('pipeline', pipeline, p => device.destroyPipeline(p));
  return Object.freeze({ kernel, layout, pipeline });
}
