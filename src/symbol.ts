export const BridgeShutdownSymbol = Symbol("bridge.shutdown");
