import {
  type Failure,
  failure,
  type InvocationResult,
  success,
} from "./result.ts";

/**
 * Wraps a managed value so it crosses the channel by reference.
 *
 * Encoding an `ObjectReference` tracks it in the channel's handle table and
 * writes `{ "__dotNetObject": <id> }` in its place; the other side hands that
 * literal back to address the same instance.
 */
export class ObjectReference<T = unknown> {
  public readonly value: T;

  private constructor(value: T) {
    this.value = value;
  }

  public static create<T>(value: T): ObjectReference<T> {
    return new ObjectReference(value);
  }

  /**
   * The codec substitutes references found in arrays and plain objects. One
   * held anywhere else (a class instance field, a Map) would otherwise be
   * written out with the managed value's contents.
   */
  public toJSON(): never {
    throw new TypeError(
      "An object reference can only be sent inside arrays and plain objects",
    );
  }
}

export interface ObjectHandle<T = unknown> {
  readonly id: number;
  readonly reference: ObjectReference<T>;
}

/**
 * Maps integer handles to the references exposed over one channel.
 *
 * Ids start at 1 and are never reused, so a stale id held by the other side
 * can only miss, never alias a newer object.
 */
export class ObjectHandleTable {
  private readonly handles = new Map<number, ObjectHandle>();
  private readonly ids = new WeakMap<ObjectReference, number>();
  private lastId = 0;

  public get size(): number {
    return this.handles.size;
  }

  public register<T>(value: T): ObjectHandle<T> {
    const reference = ObjectReference.create(value);
    return { id: this.track(reference), reference };
  }

  /**
   * Returns the id of `reference`, assigning a fresh one unless it is
   * currently tracked.
   */
  public track(reference: ObjectReference): number {
    const existing = this.idOf(reference);
    if (existing !== undefined) {
      return existing;
    }
    const id = ++this.lastId;
    this.handles.set(id, { id, reference });
    this.ids.set(reference, id);
    return id;
  }

  public idOf(reference: ObjectReference): number | undefined {
    const id = this.ids.get(reference);
    if (id === undefined || !this.handles.has(id)) {
      return undefined;
    }
    return id;
  }

  public resolve(id: number): InvocationResult<ObjectReference> {
    const handle = this.handles.get(id);
    if (!handle) {
      return unknownObjectReference(id);
    }
    return success(handle.reference);
  }

  public dispose(id: number): InvocationResult<void> {
    if (!this.handles.delete(id)) {
      return unknownObjectReference(id);
    }
    return success(undefined);
  }

  public clear(): void {
    this.handles.clear();
  }
}

export function unknownObjectReference(id: number): Failure {
  return failure(
    "UnknownObjectReference",
    `There is no tracked object with id '${id}'. Perhaps the object reference was disposed?`,
  );
}
