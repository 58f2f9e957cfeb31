import type { z } from "zod";
import { ObjectReference } from "./object-handle-table.ts";

export interface ValueParameter<T> {
  readonly kind: "value";
  readonly typeName: string;
  readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>;
}

/**
 * A handle-wrapper parameter. Only parameters declared this way accept the
 * object reference literal.
 */
export interface ObjectReferenceParameter<T> {
  readonly kind: "objectReference";
  readonly typeName: string;
  readonly isReference: (reference: ObjectReference) => reference is T & ObjectReference;
}

export type ParameterType<T = unknown> =
  | ValueParameter<T>
  | ObjectReferenceParameter<T>;

export type ParameterTypes<A extends readonly unknown[]> = {
  readonly [K in keyof A]: ParameterType<A[K]>;
};

export type Constructor<T> = abstract new (...args: never[]) => T;

export function value<T>(
  typeName: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
): ValueParameter<T> {
  return { kind: "value", typeName, schema };
}

export function objectReference<T>(
  type: Constructor<T>,
): ObjectReferenceParameter<ObjectReference<T>> {
  return {
    kind: "objectReference",
    typeName: type.name,
    isReference: (reference): reference is ObjectReference<T> =>
      reference.value instanceof type,
  };
}
