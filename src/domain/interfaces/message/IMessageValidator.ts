import type { Message } from "@domain/entities/Message";

export interface IMessageValidator {
  validate(message: Message): void;
}
