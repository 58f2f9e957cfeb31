import type { ObjectReference } from "./object-handle-table.ts";
import type {
  OperationDescriptor,
  OperationLookup,
} from "./operation-registry.ts";
import type { InvocationInfo } from "./protocol.ts";
import { failure, type InvocationResult, success } from "./result.ts";

export interface OperationResolver {
  resolve(
    info: InvocationInfo,
    target: ObjectReference | undefined,
  ): InvocationResult<OperationDescriptor>;
}

/**
 * A call addresses either a static operation through its module or an
 * instance through its handle, never both.
 */
export function checkAddressing(
  info: InvocationInfo,
  target: ObjectReference | undefined,
): InvocationResult<void> {
  if (target && info.callerContextId !== null) {
    return failure(
      "InvalidInvocation",
      `For instance operation calls, 'callerContextId' should be null. Value received: '${info.callerContextId}'.`,
    );
  }
  return success(undefined);
}

/**
 * Resolves operations through an {@link OperationLookup}, remembering every
 * hit per (module or prototype, identifier).
 */
export class CachingOperationResolver implements OperationResolver {
  private readonly lookup: OperationLookup;
  private readonly cache = new Map<unknown, Map<string, OperationDescriptor>>();

  public constructor(lookup: OperationLookup) {
    this.lookup = lookup;
  }

  public resolve(
    info: InvocationInfo,
    target: ObjectReference | undefined,
  ): InvocationResult<OperationDescriptor> {
    const addressing = checkAddressing(info, target);
    if (addressing.type === "failure") {
      return addressing;
    }
    const identifier = info.operationIdentifier;

    if (target) {
      const receiver = target.value;
      const scope: unknown =
        typeof receiver === "object" && receiver !== null
          ? Object.getPrototypeOf(receiver)
          : undefined;
      const cached = this.cached(scope, identifier);
      if (cached) {
        return success(cached);
      }
      const match = this.lookup.findInstance(receiver, identifier);
      if (!match) {
        return failure(
          "MethodNotFound",
          `The type '${typeNameOf(receiver)}' does not contain a public invokable operation named '${identifier}'.`,
        );
      }
      return success(this.remember(scope, match.descriptor));
    }

    const module = info.callerContextId;
    if (module === null) {
      return failure(
        "InvalidInvocation",
        `The call to static operation '${identifier}' must name its declaring module in 'callerContextId'.`,
      );
    }
    const cached = this.cached(module, identifier);
    if (cached) {
      return success(cached);
    }
    const descriptor = this.lookup.findStatic(module, identifier);
    if (!descriptor) {
      return failure(
        "MethodNotFound",
        `The module '${module}' does not contain a public invokable operation named '${identifier}'.`,
      );
    }
    return success(this.remember(module, descriptor));
  }

  private cached(
    scope: unknown,
    identifier: string,
  ): OperationDescriptor | undefined {
    return this.cache.get(scope)?.get(identifier);
  }

  private remember(
    scope: unknown,
    descriptor: OperationDescriptor,
  ): OperationDescriptor {
    let entries = this.cache.get(scope);
    if (!entries) {
      entries = new Map();
      this.cache.set(scope, entries);
    }
    entries.set(descriptor.identifier, descriptor);
    return descriptor;
  }
}

function typeNameOf(value: unknown): string {
  if (typeof value === "object" && value !== null) {
    return value.constructor?.name ?? "Object";
  }
  return typeof value;
}
