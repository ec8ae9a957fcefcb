import { CommandUnitConsumedError } from '../errors/harness-error';
import { BindingSetHandle, CommandPoolHandle, CommandUnitHandle, DeviceInterface } from '../device/types';
import { DispatchDimensions } from '../spec/test-spec';
import { ExecutionUnit } from './pipeline-builder';
import { ResourceScope } from './resource-scope';

/**
 * A recorded one-time-submit command unit. `take` hands the handle out once;
 * any later call throws.
 */
export class RecordedCommandUnit {
  private consumed = false;

  constructor(private readonly handle: CommandUnitHandle) { }

  get isConsumed(): boolean {
    return this.consumed;
  }

  take(): CommandUnitHandle {
    if (this.consumed) throw new CommandUnitConsumedError();
    this.consumed = true;
    return this.handle;
  }
}

export function createCommandPool(device: DeviceInterface, scope: ResourceScope): CommandPoolHandle {
  return scope.own('command pool', device.createCommandPool({ queueFamilyIndex: 0 }), p => device.destroyCommandPool(p));
}

/**
 * Records bind pipeline, bind set 0, dispatch. Nothing else goes in.
 */
export function recordCommandUnit(
  device: DeviceInterface,
  scope: ResourceScope,
  pool: CommandPoolHandle,
  unit: ExecutionUnit,
  bindingSet: BindingSetHandle,
  dims: DispatchDimensions,
): RecordedCommandUnit {
  const handle = scope.own(
    'command unit',
    device.createCommandUnit({ pool, level: 'primary' }),
    u => device.freeCommandUnit(pool, u),
  );
  device.beginRecording(handle, { oneTimeSubmit: true });
  device.bindPipeline(handle, unit.pipeline);
  device.bindBindingSet(handle, unit.layout, 0, [bindingSet]);
  device.dispatch(handle, dims[0], dims[1], dims[2]);
  device.endRecording(handle);
  return new RecordedCommandUnit(handle);
}
