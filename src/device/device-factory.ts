import { HarnessConfig } from '../config/harness-config';
import { DeviceError } from '../errors/harness-error';
import { log } from '../debug/log';
import { ReferenceDevice } from './reference-device';
import { TrackingDevice } from './tracking-device';
import { DeviceInterface } from './types';

let globalsEnsured = false;

/**
 * Installs `GPUBufferUsage` and friends from the `webgpu` package when the
 * host (plain Node) does not provide them.
 */
export async function ensureGpuGlobals(): Promise<void> {
  if (globalsEnsured) return;
  const { globals } = await import('webgpu');
  if (typeof globalThis.GPUBufferUsage === 'undefined') {
    Object.assign(globalThis, globals);
  }
  globalsEnsured = true;
}

/**
 * Opens a Dawn-backed device, or returns null when no adapter is present.
 */
export async function requestWebGpuDevice(): Promise<GPUDevice | null> {
  await ensureGpuGlobals();
  const { create } = await import('webgpu');
  const gpu = create([]);
  const adapter = await gpu.requestAdapter();
  if (!adapter) {
    log.warn('DeviceFactory', 'No WebGPU adapter found');
    return null;
  }
  return adapter.requestDevice();
}

export interface CreatedDevice {
  device: DeviceInterface;
  /** Present when `checkLeaks` is set; `device` is then this tracker. */
  tracker: TrackingDevice | null;
}

export async function createDevice(config: HarnessConfig): Promise<CreatedDevice> {
  let base: DeviceInterface;
  if (config.device === 'webgpu') {
    const { WebGpuDevice } = await import('./webgpu-device');
    const gpuDevice = await requestWebGpuDevice();
    if (!gpuDevice) throw new DeviceError('createDevice', 'unsupported', 'no WebGPU adapter available');
    base = new WebGpuDevice(gpuDevice);
  } else {
    base = new ReferenceDevice(config.reference);
  }
  log.info('DeviceFactory', `Using ${base.name} device`);

  if (!config.checkLeaks) return { device: base, tracker: null };
  const tracker = new TrackingDevice(base);
  return { device: tracker, tracker };
}
