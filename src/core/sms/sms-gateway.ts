/**
 * Outbound SMS. `send` resolves once the provider accepted the message and throws otherwise.
 */
export type SmsGateway = {
  send(phoneNumber: string, message: string): Promise<void>;
};

export type OutboxMessage = {
  to: string;
  body: string;
  sentAt: Date;
};

export type TestModeSmsGateway = SmsGateway & {
  readonly outbox: readonly OutboxMessage[];
  /**
   * Most recent message to `phoneNumber`, if any.
   */
  lastMessageTo(phoneNumber: string): OutboxMessage | undefined;
  clear(): void;
};

/**
 * Keeps messages in memory instead of sending them. Used when no SMS provider is configured
 * and in tests.
 */
export function createTestModeSmsGateway(
  options: { now?: () => Date; fail?: (phoneNumber: string) => Error | undefined } = {}
): TestModeSmsGateway {
  const outbox: OutboxMessage[] = [];
  const now = options.now ?? (() => new Date());
  return {
    outbox,
    async send(phoneNumber, message) {
      const failure = options.fail?.(phoneNumber);
      if (failure) throw failure;
      outbox.push({ to: phoneNumber, body: message, sentAt: now() });
    },
    lastMessageTo(phoneNumber) {
      for (let i = outbox.length - 1; i >= 0; i--) {
        const m = outbox[i];
        if (m && m.to === phoneNumber) return m;
      }
      return undefined;
    },
    clear() {
      outbox.length = 0;
    }
  };
}
