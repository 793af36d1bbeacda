import type { Message } from "@domain/entities/Message";
import { MessageTooLargeError } from "@domain/errors/PubSubError";
import type { IMessageValidator } from "@domain/interfaces/message/IMessageValidator";

export class SizeValidator implements IMessageValidator {
  constructor(private getMaxSize: () => number) {}

  validate({ size }: Message) {
    const maxSize = this.getMaxSize();
    if (size > maxSize) throw new MessageTooLargeError(size, maxSize);
  }
}
