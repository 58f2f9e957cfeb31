import { z } from "zod";
import { ErrorKinds } from "./errors.ts";
import {
  type ObjectHandleTable,
  ObjectReference,
} from "./object-handle-table.ts";
import type { ParameterType } from "./parameter-types.ts";
import {
  failure,
  type InvocationResult,
  messageOf,
  success,
} from "./result.ts";

export type Json = {
  parse: <T = unknown>(text: string) => T;
  stringify: (value: unknown) => string;
};

/** Key of the object reference literal `{ "__dotNetObject": <id> }`. */
export const OBJECT_REFERENCE_KEY = "__dotNetObject";

/**
 * `{ "__dotNetObject": <id> }`, the form an object reference takes on the
 * wire. Pass it as `returns` to receive a reference from the other side.
 */
export const objectReferenceLiteral = z
  .object({ [OBJECT_REFERENCE_KEY]: z.number().int().positive() })
  .strict();

/** An object held by the other side, addressed by its handle. */
export type RemoteReference = z.output<typeof objectReferenceLiteral>;

const errorDescription = z.union([
  z.string().transform((message) => ({
    kind: "InvocationFailure" as const,
    message,
  })),
  z.object({ kind: z.enum(ErrorKinds), message: z.string() }),
]);

const completionTuple = z.tuple([z.string(), z.boolean(), z.unknown()]);

export interface Completion {
  readonly correlationId: string;
  readonly result: InvocationResult;
}

/**
 * Translates between JSON payloads and the values handed to operations.
 *
 * Uses built-in `JSON` by default. Any implementation with the same
 * `parse`/`stringify` pair (superjson, for instance) can be swapped in, as long
 * as both ends of the channel agree on it.
 */
export class ArgumentCodec {
  private readonly handles: ObjectHandleTable;
  private readonly json: Json;

  public constructor(handles: ObjectHandleTable, json: Json = JSON) {
    this.handles = handles;
    this.json = json;
  }

  public decodeArguments(
    operationIdentifier: string,
    argsJson: string,
    parameterTypes: readonly ParameterType[],
  ): InvocationResult<unknown[]> {
    // Payloads are not even read when nothing is expected.
    if (parameterTypes.length === 0) {
      return success([]);
    }

    const parsed = this.parse(argsJson);
    if (parsed.type === "failure") {
      return parsed;
    }
    if (!Array.isArray(parsed.value)) {
      return failure(
        "MalformedPayload",
        `Invalid JSON: the arguments for '${operationIdentifier}' must be an array.`,
      );
    }
    const elements: readonly unknown[] = parsed.value;

    const args: unknown[] = [];
    for (const [index, parameterType] of parameterTypes.entries()) {
      if (index >= elements.length) {
        break;
      }
      const decoded = this.decodeArgument(
        operationIdentifier,
        index + 1,
        elements[index],
        parameterType,
      );
      if (decoded.type === "failure") {
        return decoded;
      }
      args.push(decoded.value);
    }

    if (elements.length < parameterTypes.length) {
      return failure(
        "ArityMismatch",
        `The call to '${operationIdentifier}' expects '${parameterTypes.length}' parameters, but received '${elements.length}'.`,
      );
    }
    if (elements.length > parameterTypes.length) {
      return failure(
        "ArityMismatch",
        `Unexpected argument at position ${parameterTypes.length + 1}. Ensure that the call to '${operationIdentifier}' is supplied with exactly '${parameterTypes.length}' parameters.`,
      );
    }
    return success(args);
  }

  /**
   * Encodes a return value. `undefined` means the operation is void and
   * produces no payload.
   */
  public encodeValue(value: unknown): InvocationResult<string | undefined> {
    if (value === undefined) {
      return success(undefined);
    }
    return this.stringify(value);
  }

  public encodeArguments(args: readonly unknown[]): string {
    return this.json.stringify(this.toWire(args));
  }

  public encodeCompletion(
    correlationId: string,
    result: InvocationResult,
  ): InvocationResult<string> {
    switch (result.type) {
      case "success": {
        const encoded = this.stringify([correlationId, true, result.value]);
        if (encoded.type === "success") {
          return encoded;
        }
        return this.encodeCompletion(correlationId, encoded);
      }
      case "failure": {
        return this.stringify([
          correlationId,
          false,
          { kind: result.kind, message: result.message },
        ]);
      }
      default: {
        const _: never = result; // exhaustiveness check
        return _;
      }
    }
  }

  /**
   * Decodes `[correlationId, success, valueOrError]`. Anything but exactly
   * those three elements is rejected.
   */
  public decodeCompletion(completionJson: string): InvocationResult<Completion> {
    const parsed = this.parse(completionJson);
    if (parsed.type === "failure") {
      return parsed;
    }
    const tuple = completionTuple.safeParse(parsed.value);
    if (!tuple.success) {
      return failure(
        "MalformedPayload",
        "Invalid JSON: a completion must be [correlationId: string, success: boolean, value].",
        tuple.error,
      );
    }
    const [correlationId, succeeded, payload] = tuple.data;
    if (succeeded) {
      return success({ correlationId, result: success(payload) });
    }
    const description = errorDescription.safeParse(payload);
    if (!description.success) {
      return failure(
        "MalformedPayload",
        `Invalid error description in the completion of call '${correlationId}'.`,
        description.error,
      );
    }
    return success({
      correlationId,
      result: failure(description.data.kind, description.data.message),
    });
  }

  private decodeArgument(
    operationIdentifier: string,
    position: number,
    element: unknown,
    parameterType: ParameterType,
  ): InvocationResult {
    const { typeName } = parameterType;
    switch (parameterType.kind) {
      case "value": {
        if (isObjectReferenceLiteral(element)) {
          return failure(
            "InvalidHandleUsage",
            `In call to '${operationIdentifier}', parameter of type '${typeName}' at position ${position} must be declared as type 'ObjectReference<${typeName}>' to receive the incoming value.`,
          );
        }
        const parsed = parameterType.schema.safeParse(element);
        if (!parsed.success) {
          return failure(
            "MalformedPayload",
            `In call to '${operationIdentifier}', the argument at position ${position} could not be converted to '${typeName}': ${parsed.error.issues
              .map((issue) => issue.message)
              .join("; ")}`,
            parsed.error,
          );
        }
        return success(parsed.data);
      }
      case "objectReference": {
        const literal = objectReferenceLiteral.safeParse(element);
        if (!literal.success) {
          return failure(
            "MalformedPayload",
            `In call to '${operationIdentifier}', the argument at position ${position} must be an object reference to '${typeName}'.`,
            literal.error,
          );
        }
        const id = literal.data[OBJECT_REFERENCE_KEY];
        const reference = this.handles.resolve(id);
        if (reference.type === "failure") {
          return reference;
        }
        if (!parameterType.isReference(reference.value)) {
          return failure(
            "InvalidHandleUsage",
            `In call to '${operationIdentifier}', the object reference '${id}' at position ${position} does not refer to a '${typeName}'.`,
          );
        }
        return success(reference.value);
      }
      default: {
        const _: never = parameterType; // exhaustiveness check
        return _;
      }
    }
  }

  private parse(text: string): InvocationResult {
    try {
      return success(this.json.parse(text));
    } catch (err) {
      return failure("MalformedPayload", `Invalid JSON: ${messageOf(err)}`, err);
    }
  }

  private stringify(value: unknown): InvocationResult<string> {
    try {
      // Functions and symbols stringify to undefined rather than throwing.
      const text: unknown = this.json.stringify(this.toWire(value));
      if (typeof text !== "string") {
        return failure(
          "InvocationFailure",
          `The result could not be serialized: a ${typeof value} has no JSON representation`,
        );
      }
      return success(text);
    } catch (err) {
      return failure(
        "InvocationFailure",
        `The result could not be serialized: ${messageOf(err)}`,
        err,
      );
    }
  }

  /**
   * Replaces every `ObjectReference` reachable through plain objects and
   * arrays with its reference literal, tracking it on the way. Other objects
   * are left to the JSON implementation; a reference inside one fails to
   * serialize.
   */
  private toWire(value: unknown): unknown {
    if (value instanceof ObjectReference) {
      return { [OBJECT_REFERENCE_KEY]: this.handles.track(value) };
    }
    if (Array.isArray(value)) {
      return value.map((item: unknown) => this.toWire(item));
    }
    if (isPlainObject(value)) {
      return Object.fromEntries(
        Object.entries(value).map(([key, item]) => [key, this.toWire(item)]),
      );
    }
    return value;
  }
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null) {
    return false;
  }
  const prototype: unknown = Object.getPrototypeOf(value);
  return prototype === Object.prototype || prototype === null;
}

function isObjectReferenceLiteral(value: unknown): boolean {
  return (
    isPlainObject(value) && Object.hasOwn(value, OBJECT_REFERENCE_KEY)
  );
}
