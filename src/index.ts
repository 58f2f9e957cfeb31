export {
  ArgumentCodec,
  type Completion,
  type Json,
  OBJECT_REFERENCE_KEY,
  objectReferenceLiteral,
  type RemoteReference,
} from "./argument-codec.ts";
export { Bridge, type BridgeOptions } from "./bridge.ts";
export {
  type BridgeConfig,
  bridgeConfigSchema,
  configFromEnv,
  parseConfig,
} from "./config.ts";
export {
  type CompletionNotifier,
  Dispatcher,
  type DispatcherContext,
} from "./dispatcher.ts";
export {
  BridgeError,
  DuplicateOperationError,
  type ErrorKind,
  ErrorKinds,
  ReservedOperationError,
} from "./errors.ts";
export {
  createLogger,
  LOG_CONTEXT,
  type LoggerAdapter,
  type LoggerOptions,
  type LogLevel,
} from "./logger.ts";
export {
  type ObjectHandle,
  ObjectHandleTable,
  ObjectReference,
  unknownObjectReference,
} from "./object-handle-table.ts";
export {
  DISPOSE_OPERATION,
  type InstanceMatch,
  type InstanceOperation,
  type OperationDescriptor,
  type OperationLookup,
  OperationRegistry,
  type StaticOperation,
} from "./operation-registry.ts";
export {
  CachingOperationResolver,
  checkAddressing,
  type OperationResolver,
} from "./operation-resolver.ts";
export {
  type CallSender,
  CompletionSlot,
  OutboundCalls,
  type OutboundCallOptions,
  type OutboundRequest,
} from "./outbound-calls.ts";
export {
  type Constructor,
  objectReference,
  type ObjectReferenceParameter,
  type ParameterType,
  type ParameterTypes,
  value,
  type ValueParameter,
} from "./parameter-types.ts";
export {
  type BridgeMessage,
  decodeMessage,
  encodeBeginInvoke,
  encodeEndInvoke,
  type InvocationInfo,
  invocationInfo,
  invocationInfoSchema,
  type RejectedInvocation,
} from "./protocol.ts";
export {
  type Failure,
  failure,
  innermostCause,
  type InvocationResult,
  type Success,
  success,
} from "./result.ts";
export { BridgeShutdownSymbol } from "./symbol.ts";
export type { Subscriber, Transport } from "./transport.ts";
export { InMemoryTransport } from "./backends/in-memory.ts";
