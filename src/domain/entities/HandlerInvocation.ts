/** One call into the subscriber's handler and the messages it carried. */
export class HandlerInvocation {
  settled = false;

  constructor(readonly messageIds: readonly string[]) {}
}
