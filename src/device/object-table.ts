import { DeviceError } from '../errors/harness-error';
import { Handle, ObjectKind, makeHandle } from './types';

/**
 * Id-keyed store for one kind of device object. Lookups with a stale or
 * foreign handle fail with `invalid-argument`.
 */
export class ObjectTable<K extends ObjectKind, S> {
  private readonly objects = new Map<number, S>();

  constructor(readonly kind: K, private readonly ids: { next: number }) { }

  add(state: S): Handle<K> {
    const id = this.ids.next++;
    this.objects.set(id, state);
    return makeHandle(this.kind, id);
  }

  get(handle: Handle<K>, operation: string): S {
    const state = this.objects.get(handle.id);
    if (!state || handle.kind !== this.kind) {
      throw new DeviceError(operation, 'invalid-argument', `unknown ${this.kind} #${handle.id}`);
    }
    return state;
  }

  getById(id: number): S | undefined {
    return this.objects.get(id);
  }

  delete(handle: Handle<K>, operation: string): S {
    const state = this.get(handle, operation);
    this.objects.delete(handle.id);
    return state;
  }

  deleteById(id: number) {
    this.objects.delete(id);
  }

  get size(): number {
    return this.objects.size;
  }
}
