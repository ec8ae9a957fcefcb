export * from './errors/harness-error';
export * from './config/harness-config';
export { log, setLogLevel, getLogLevel, getLogHistory, clearLogHistory } from './debug/log';
export type { LogLevel, LogEntry } from './debug/log';

export * from './device/types';
export { ReferenceDevice } from './device/reference-device';
export type { ReferenceDeviceOptions } from './device/reference-device';
export { DelegatingDevice } from './device/delegating-device';
export { TrackingDevice } from './device/tracking-device';
export { WebGpuDevice } from './device/webgpu-device';
export { createDevice, ensureGpuGlobals, requestWebGpuDevice } from './device/device-factory';
export type { CreatedDevice } from './device/device-factory';

export { BufferData } from './spec/buffer-data';
export * from './spec/test-spec';
export * from './spec/spec-loader';

export * from './programs/program-collection';

export { ResourceScope, withResourceScope } from './harness/resource-scope';
export * from './harness/buffer-resource';
export * from './harness/binding-set';
export { ENTRY_POINT, loadKernel } from './harness/kernel-loader';
export * from './harness/pipeline-builder';
export * from './harness/command-sequencer';
export * from './harness/submission';
export * from './harness/verifier';
export * from './harness/orchestrator';

export * from './case/test-status';
export * from './case/test-context';
export * from './case/compute-shader-case';
