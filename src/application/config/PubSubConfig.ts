import { InvalidOptionsError } from "@domain/errors/PubSubError";
import { compact } from "@domain/utils/compact";
import type { IPubSubConfig } from "@domain/interfaces/IPubSubConfig";
import Ajv, { type ErrorObject, type JSONSchemaType } from "ajv";

export const DEFAULT_CONFIG: Readonly<IPubSubConfig> = Object.freeze({
  partitionCount: 16,
  maxPartitions: 1024,
  maxBacklog: 10_000,
  backlogPolicy: "reject",
  maxMessageSize: 1_048_576, // 1 MiB
  sweepIntervalMs: 100,
  closeGracePeriodMs: 5_000,
  dedupRetentionMs: 300_000,
  dedupMaxEntries: 100_000,
  ackChannelCapacity: 1_024,
  logLevel: "info",
  logPretty: false,
  logBufferSize: 50,
});

const configSchema: JSONSchemaType<IPubSubConfig> = {
  type: "object",
  properties: {
    partitionCount: { type: "integer", minimum: 1 },
    maxPartitions: { type: "integer", minimum: 1 },
    maxBacklog: { type: "integer", minimum: 1 },
    backlogPolicy: { type: "string", enum: ["reject", "block"] },
    maxMessageSize: { type: "integer", minimum: 0 },
    sweepIntervalMs: { type: "integer", minimum: 1 },
    closeGracePeriodMs: { type: "integer", minimum: 0 },
    dedupRetentionMs: { type: "integer", minimum: 1 },
    dedupMaxEntries: { type: "integer", minimum: 1 },
    ackChannelCapacity: { type: "integer", minimum: 1 },
    logLevel: {
      type: "string",
      enum: ["trace", "debug", "info", "warn", "error", "fatal"],
    },
    logPretty: { type: "boolean" },
    logBufferSize: { type: "integer", minimum: 1 },
  },
  required: [
    "partitionCount",
    "maxPartitions",
    "maxBacklog",
    "backlogPolicy",
    "maxMessageSize",
    "sweepIntervalMs",
    "closeGracePeriodMs",
    "dedupRetentionMs",
    "dedupMaxEntries",
    "ackChannelCapacity",
    "logLevel",
    "logPretty",
    "logBufferSize",
  ],
  additionalProperties: false,
};

const strict = new Ajv({ allErrors: true, coerceTypes: false });
const coercing = new Ajv({ allErrors: true, coerceTypes: true });
const validateStrict = strict.compile(configSchema);
const validateCoercing = coercing.compile(configSchema);

export function formatSchemaErrors(
  errors: ErrorObject[] | null | undefined
): string[] {
  return (errors ?? []).map((e) => {
    const field =
      e.instancePath.slice(1) ||
      e.params.missingProperty ||
      e.params.additionalProperty ||
      "config";
    return `${field} ${e.message ?? "is invalid"}`;
  });
}

/** Merges explicit values over the defaults and validates the result. */
export function resolveConfig(
  partial: Partial<IPubSubConfig> = {}
): IPubSubConfig {
  const config = { ...DEFAULT_CONFIG, ...compact(partial) };
  if (!validateStrict(config)) {
    throw new InvalidOptionsError(formatSchemaErrors(validateStrict.errors));
  }
  return config;
}

export function toEnvName(field: string, prefix = "PUBSUB_") {
  return prefix + field.replace(/([A-Z])/g, "_$1").toUpperCase();
}

/** Reads `PUBSUB_*` variables, e.g. `PUBSUB_MAX_BACKLOG=500`. */
export function loadConfig(
  env: Record<string, string | undefined> = process.env
): IPubSubConfig {
  const config: Record<string, unknown> = { ...DEFAULT_CONFIG };
  for (const field of Object.keys(DEFAULT_CONFIG)) {
    const raw = env[toEnvName(field)];
    if (raw !== undefined && raw !== "") config[field] = raw.trim();
  }

  if (!validateCoercing(config)) {
    throw new InvalidOptionsError(formatSchemaErrors(validateCoercing.errors));
  }
  return config;
}
