import { DeviceInterface, KernelHandle, ProgramBinary } from '../device/types';
import { ResourceScope } from './resource-scope';

export const ENTRY_POINT = 'main';

/** Hands a pre-built binary to the device. Nothing is compiled here. */
export async function loadKernel(device: DeviceInterface, scope: ResourceScope, binary: ProgramBinary): Promise<KernelHandle> {
  const kernel = await device.createKernelObject({ binary, entryPoint: ENTRY_POINT });
  return scope.own('kernel', kernel, k => device.destroyKernelObject(k));
}
