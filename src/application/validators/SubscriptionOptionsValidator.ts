import { formatSchemaErrors } from "@app/config/PubSubConfig";
import { InvalidOptionsError } from "@domain/errors/PubSubError";
import { compact } from "@domain/utils/compact";
import { DeliveryGuarantee } from "@domain/interfaces/subscription/DeliveryGuarantee";
import type {
  IResolvedSubscriptionOptions,
  ISubscriptionOptions,
} from "@domain/interfaces/subscription/ISubscriptionOptions";
import Ajv, { type JSONSchemaType } from "ajv";

const optionsSchema: JSONSchemaType<IResolvedSubscriptionOptions> = {
  type: "object",
  properties: {
    maxMessageSize: { type: "integer", minimum: 0 },
    ackTimeoutMs: { type: "integer", minimum: 1 },
    deliveryGuarantee: {
      type: "string",
      enum: Object.values(DeliveryGuarantee),
    },
    maxRetries: { type: "integer", minimum: 0 },
    initialBackoffMs: { type: "integer", minimum: 0 },
    maxBackoffMs: { type: "integer", minimum: 0 },
    maxBatchSize: { type: "integer", minimum: 1 },
  },
  required: [
    "maxMessageSize",
    "ackTimeoutMs",
    "deliveryGuarantee",
    "maxRetries",
    "initialBackoffMs",
    "maxBackoffMs",
    "maxBatchSize",
  ],
  additionalProperties: false,
};

export class SubscriptionOptionsValidator {
  private validateFn = new Ajv({ allErrors: true }).compile(optionsSchema);

  constructor(private defaultMaxMessageSize: number) {}

  resolve(options: Partial<ISubscriptionOptions> = {}) {
    const resolved = {
      maxMessageSize: this.defaultMaxMessageSize,
      ackTimeoutMs: 30_000,
      deliveryGuarantee: DeliveryGuarantee.AtLeastOnce,
      maxRetries: 3,
      initialBackoffMs: 0,
      maxBackoffMs: 30_000,
      maxBatchSize: Number.MAX_SAFE_INTEGER,
      ...compact(options),
    };

    if (!this.validateFn(resolved)) {
      throw new InvalidOptionsError(formatSchemaErrors(this.validateFn.errors));
    }
    return resolved;
  }
}
