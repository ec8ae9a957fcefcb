import { ResourceLeakError, isHarnessError } from '../errors/harness-error';
import { log } from '../debug/log';
import { ObjectKind } from '../device/types';
import { TrackingDevice } from '../device/tracking-device';
import { runComputeTest } from '../harness/orchestrator';
import {
  COMPUTE_PROGRAM_NAME, SourceCollection, buildPrograms, textProgramBuilder,
} from '../programs/program-collection';
import { TestSpecification } from '../spec/test-spec';
import { HarnessEnvironment, TestContext } from './test-context';
import { TestOutcome, TestStatus, outcomeOf } from './test-status';

function leakedSince(tracker: TrackingDevice, before: Map<ObjectKind, number>): Map<string, number> {
  const leaked = new Map<string, number>();
  for (const [kind, count] of tracker.liveObjects()) {
    const delta = count - (before.get(kind) ?? 0);
    if (delta > 0) leaked.set(kind, delta);
  }
  return leaked;
}

export class ComputeShaderInstance {
  constructor(
    private readonly context: TestContext,
    private readonly spec: TestSpecification,
  ) { }

  /**
   * Runs the case once. Device and harness failures propagate; a mismatch
   * comes back as `fail` and an expired wait as `timeout`.
   */
  async iterate(): Promise<TestStatus> {
    const { tracker, device, binaries, config } = this.context;
    const before = tracker?.liveObjects();
    const binary = binaries.get(COMPUTE_PROGRAM_NAME);

    let status: TestStatus;
    try {
      status = await runComputeTest(device, this.spec, binary, { waitTimeoutMs: config.waitTimeoutMs });
    } catch (err) {
      if (tracker && before) {
        const leaked = leakedSince(tracker, before);
        if (leaked.size > 0) log.error('ComputeShaderCase', 'Objects leaked while unwinding a failed iteration', Object.fromEntries(leaked));
      }
      throw err;
    }

    if (tracker && before) {
      const leaked = leakedSince(tracker, before);
      if (leaked.size > 0) throw new ResourceLeakError(leaked);
    }
    return status;
  }
}

/**
 * Framework-facing test case: a name, a description and the specification
 * that drives it.
 */
export class ComputeShaderCase {
  constructor(
    readonly name: string,
    readonly description: string,
    readonly spec: TestSpecification,
  ) { }

  initPrograms(sources: SourceCollection): void {
    sources.add(COMPUTE_PROGRAM_NAME, this.spec.kernelSource);
  }

  createInstance(context: TestContext): ComputeShaderInstance {
    return new ComputeShaderInstance(context, this.spec);
  }

  /** Builds this case's programs for `env`'s device and runs one iteration. */
  async execute(env: HarnessEnvironment): Promise<TestOutcome> {
    log.info('ComputeShaderCase', `Running ${this.name} on ${env.device.name}`);
    try {
      const sources = new SourceCollection();
      this.initPrograms(sources);
      const binaries = buildPrograms(sources, textProgramBuilder(env.device.programFormat));
      const status = await this.createInstance({ ...env, binaries }).iterate();
      return outcomeOf(status);
    } catch (err) {
      if (isHarnessError(err)) {
        log.error('ComputeShaderCase', `${this.name}: ${err.message}`);
        return { kind: 'fatal', error: err };
      }
      throw err;
    }
  }
}

export async function executeComputeTest(
  env: HarnessEnvironment,
  spec: TestSpecification,
  name = 'compute',
): Promise<TestOutcome> {
  return new ComputeShaderCase(name, '', spec).execute(env);
}
