import { HarnessConfig, loadHarnessConfig } from '../config/harness-config';
import { setLogLevel } from '../debug/log';
import { createDevice } from '../device/device-factory';
import { TrackingDevice } from '../device/tracking-device';
import { DeviceInterface } from '../device/types';
import { BinaryCollection } from '../programs/program-collection';

/** What every test shares: settings and the device under test. */
export interface HarnessEnvironment {
  readonly config: HarnessConfig;
  readonly device: DeviceInterface;
  /** Set when leak checking is on; wraps `device`. */
  readonly tracker: TrackingDevice | null;
}

/** Environment plus the binaries built for one case. */
export interface TestContext extends HarnessEnvironment {
  readonly binaries: BinaryCollection;
}

export async function createHarnessEnvironment(config: HarnessConfig = loadHarnessConfig()): Promise<HarnessEnvironment> {
  setLogLevel(config.logLevel);
  const { device, tracker } = await createDevice(config);
  return { config, device, tracker };
}
