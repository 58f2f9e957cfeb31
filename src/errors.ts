export const ErrorKinds = [
  "MalformedPayload",
  "ArityMismatch",
  "InvalidHandleUsage",
  "UnknownObjectReference",
  "MethodNotFound",
  "InvalidInvocation",
  "InvocationFailure",
  "UnknownCorrelationId",
  "Timeout",
  "ChannelClosed",
] as const;

export type ErrorKind = (typeof ErrorKinds)[number];

/**
 * A structured dispatch failure surfaced as an exception.
 *
 * Inside the dispatcher failures travel as `Failure` results; this class is
 * what callers see at the boundaries that throw or reject.
 */
export class BridgeError extends Error {
  public readonly kind: ErrorKind;

  public constructor(kind: ErrorKind, message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = "BridgeError";
    this.kind = kind;
  }
}

export class DuplicateOperationError extends Error {
  public constructor(scope: string, identifier: string) {
    super(`Operation '${identifier}' is already registered on '${scope}'`);
    this.name = "DuplicateOperationError";
  }
}

export class ReservedOperationError extends Error {
  public constructor(identifier: string) {
    super(`Operation identifier '${identifier}' is reserved`);
    this.name = "ReservedOperationError";
  }
}
