import { Message } from "@domain/entities/Message";
import type { IMessageMetadata } from "@domain/interfaces/message/IMessageMetadata";
import type { IMessageValidator } from "@domain/interfaces/message/IMessageValidator";
import { randomUUID } from "node:crypto";

export class MessageFactory {
  constructor(
    private validators: IMessageValidator[] = [],
    private generateId: () => string = randomUUID
  ) {}

  create(value: Uint8Array, metadata: IMessageMetadata = {}): Message {
    const message = new Message({
      value,
      messageId: metadata.messageId ?? this.generateId(),
      timestamp: metadata.timestamp,
      contentType: metadata.contentType,
      correlationId: metadata.correlationId,
    });
    this.validate(message);
    return message;
  }

  validate(message: Message) {
    this.validators.forEach((v) => v.validate(message));
  }
}
