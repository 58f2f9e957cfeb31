import { DuplicateOperationError, ReservedOperationError } from "./errors.ts";
import type {
  Constructor,
  ParameterType,
  ParameterTypes,
} from "./parameter-types.ts";

/** Reserved identifier of the operation that disposes an object handle. */
export const DISPOSE_OPERATION = "__Dispose";

export type StaticOperation<A extends unknown[] = never[], R = unknown> = (
  ...args: A
) => R | Promise<R>;

export type InstanceOperation<
  T,
  A extends unknown[] = never[],
  R = unknown,
> = (target: T, ...args: A) => R | Promise<R>;

/**
 * An invokable target together with its ordered parameter types.
 */
export interface OperationDescriptor {
  readonly identifier: string;
  readonly parameterTypes: readonly ParameterType[];
  invoke(receiver: unknown, args: readonly unknown[]): unknown;
}

export interface InstanceMatch {
  /** Prototype the operation is declared on. */
  readonly prototype: object;
  readonly typeName: string;
  readonly descriptor: OperationDescriptor;
}

/**
 * Lookup capability consumed by the resolver.
 */
export interface OperationLookup {
  findStatic(
    module: string,
    identifier: string,
  ): OperationDescriptor | undefined;

  findInstance(receiver: unknown, identifier: string): InstanceMatch | undefined;
}

/**
 * Explicit registration table built at startup.
 *
 * Static operations are declared on a module name; instance operations on a
 * class, and are found for instances of that class and of its subclasses.
 *
 * @example
 * ```ts
 * const registry = new OperationRegistry()
 *   .registerStatic(
 *     "Calculator",
 *     "Add",
 *     [value("int", z.number().int()), value("int", z.number().int())],
 *     (a: number, b: number) => a + b,
 *   )
 *   .registerInstance(
 *     Counter,
 *     "Increment",
 *     [value("int", z.number().int())],
 *     (counter: Counter, by: number) => counter.increment(by),
 *   );
 * ```
 */
export class OperationRegistry implements OperationLookup {
  private readonly statics = new Map<string, Map<string, OperationDescriptor>>();
  private readonly instances = new Map<
    object,
    { typeName: string; operations: Map<string, OperationDescriptor> }
  >();

  public registerStatic<A extends unknown[], R>(
    module: string,
    identifier: string,
    parameterTypes: ParameterTypes<A>,
    operation: StaticOperation<A, R>,
  ): this {
    let operations = this.statics.get(module);
    if (!operations) {
      operations = new Map();
      this.statics.set(module, operations);
    }
    if (operations.has(identifier)) {
      throw new DuplicateOperationError(module, identifier);
    }
    operations.set(identifier, {
      identifier,
      parameterTypes: [...parameterTypes],
      invoke: (_receiver, args) => Reflect.apply(operation, undefined, args),
    });
    return this;
  }

  public registerInstance<T, A extends unknown[], R>(
    type: Constructor<T>,
    identifier: string,
    parameterTypes: ParameterTypes<A>,
    operation: InstanceOperation<T, A, R>,
  ): this {
    if (identifier === DISPOSE_OPERATION) {
      throw new ReservedOperationError(identifier);
    }
    const prototype: unknown = type.prototype;
    if (typeof prototype !== "object" || prototype === null) {
      throw new TypeError(`'${type.name}' has no prototype to register on`);
    }
    let entry = this.instances.get(prototype);
    if (!entry) {
      entry = { typeName: type.name, operations: new Map() };
      this.instances.set(prototype, entry);
    }
    if (entry.operations.has(identifier)) {
      throw new DuplicateOperationError(type.name, identifier);
    }
    entry.operations.set(identifier, {
      identifier,
      parameterTypes: [...parameterTypes],
      invoke: (receiver, args) =>
        Reflect.apply(operation, undefined, [receiver, ...args]),
    });
    return this;
  }

  public findStatic(
    module: string,
    identifier: string,
  ): OperationDescriptor | undefined {
    return this.statics.get(module)?.get(identifier);
  }

  public findInstance(
    receiver: unknown,
    identifier: string,
  ): InstanceMatch | undefined {
    if (typeof receiver !== "object" || receiver === null) {
      return undefined;
    }
    let prototype: unknown = Object.getPrototypeOf(receiver);
    while (typeof prototype === "object" && prototype !== null) {
      const entry = this.instances.get(prototype);
      const descriptor = entry?.operations.get(identifier);
      if (entry && descriptor) {
        return { prototype, typeName: entry.typeName, descriptor };
      }
      prototype = Object.getPrototypeOf(prototype);
    }
    return undefined;
  }
}
