export { createPubSub } from "@infra/factories/PubSubFactory";
export type { IPubSubFactoryDeps } from "@infra/factories/PubSubFactory";
export { PubSub } from "@app/services/PubSub";
export type { IPubSubMetrics } from "@app/services/PubSub";
export type { ITopicMetrics } from "@app/services/Topic";
export { DLQManager } from "@app/services/DLQManager";
export { DedupLedger } from "@app/services/DedupLedger";
export {
  DEFAULT_CONFIG,
  loadConfig,
  resolveConfig,
} from "@app/config/PubSubConfig";

export { Message, DEFAULT_CONTENT_TYPE } from "@domain/entities/Message";
export type { IMessageInit } from "@domain/entities/Message";
export type { AckMessage } from "@domain/entities/AckMessage";
export * from "@domain/errors/PubSubError";
export { DeliveryGuarantee } from "@domain/interfaces/subscription/DeliveryGuarantee";
export type { ISubscriptionOptions } from "@domain/interfaces/subscription/ISubscriptionOptions";
export type {
  BatchHandler,
  IBatchConsumer,
  SubscriptionHandler,
} from "@domain/interfaces/subscription/IBatchConsumer";
export type {
  IMessageMetadata,
  IPublishMetadata,
  OrderingKey,
} from "@domain/interfaces/message/IMessageMetadata";
export type {
  IDeliveryOutcome,
  DeliveryOutcomeStatus,
  OutcomeListener,
} from "@domain/interfaces/delivery/IDeliveryOutcome";
export type { IDLQEntry } from "@domain/interfaces/dlq/IDLQEntry";
export type { DLQReason } from "@domain/interfaces/dlq/DLQReason";
export type {
  IPartition,
  IPartitionMetrics,
  PartitionState,
} from "@domain/interfaces/partition/IPartition";
export type { IPartitioner } from "@domain/interfaces/partition/IPartitioner";
export type { IPubSub } from "@domain/interfaces/IPubSub";
export type {
  BacklogPolicy,
  IPubSubConfig,
  LogLevel,
} from "@domain/interfaces/IPubSubConfig";
export type { IAckReceiver } from "@domain/ports/IAckReceiver";
export type { ILogDriver } from "@domain/ports/ILogDriver";
export type { IHasher } from "@domain/ports/IHasher";

export { AckChannel } from "@infra/channel/AckChannel";
export type { AckChannelOverflowPolicy } from "@infra/channel/AckChannel";
export { PinoLogDriver, createLogDriver } from "@infra/logging/PinoLogDriver";
