import { z } from "zod";

export const bridgeConfigSchema = z.object({
  /** Milliseconds an outbound call may stay pending; 0 disables the limit. */
  outboundTimeoutMs: z.coerce.number().int().nonnegative().default(60_000),
  logLevel: z.enum(["debug", "info", "warn", "error"]).default("info"),
  redisUrl: z.string().url().optional(),
  inboxTopic: z.string().min(1).default("bridge-inbound"),
  outboxTopic: z.string().min(1).default("bridge-outbound"),
});

export type BridgeConfig = z.infer<typeof bridgeConfigSchema>;

export function parseConfig(input: unknown = {}): BridgeConfig {
  return bridgeConfigSchema.parse(input);
}

/**
 * Reads the bridge configuration from `BRIDGE_*` environment variables.
 * Unset and empty variables fall back to the defaults.
 */
export function configFromEnv(
  env: Readonly<Record<string, string | undefined>> = process.env,
): BridgeConfig {
  const read = (name: string) => env[name] || undefined;
  return parseConfig({
    outboundTimeoutMs: read("BRIDGE_OUTBOUND_TIMEOUT_MS"),
    logLevel: read("BRIDGE_LOG_LEVEL"),
    redisUrl: read("BRIDGE_REDIS_URL"),
    inboxTopic: read("BRIDGE_INBOX_TOPIC"),
    outboxTopic: read("BRIDGE_OUTBOX_TOPIC"),
  });
}
