// Serial task queue behind every backend and dispatcher. Posting never
// blocks: tasks run later, one at a time, in the order they were posted.

import { formatErrorMessage, type DiagnosticsLogger } from "./diagnostics.js";

export type MailboxErrorHandler = (err: unknown) => void;

export type Mailbox = {
  post: (task: () => void | Promise<void>) => void;
  /** Resolves once every task posted so far has run. */
  idle: () => Promise<void>;
  pendingCount: () => number;
};

export type MailboxOptions = {
  onError: MailboxErrorHandler;
  /** Receives failures of `onError` itself. */
  logger?: DiagnosticsLogger;
};

export function createMailbox(options: MailboxOptions): Mailbox {
  const logger = options.logger ?? console;
  let chain: Promise<void> = Promise.resolve();
  let pending = 0;

  const post = (task: () => void | Promise<void>) => {
    pending += 1;
    chain = chain
      .then(task)
      .catch((err: unknown) => {
        try {
          options.onError(err);
        } catch (handlerErr) {
          // keeps the chain resolved for the next task
          logger.error(`logfan: error handler failed: ${formatErrorMessage(handlerErr)}`);
        }
      })
      .finally(() => {
        pending -= 1;
      });
  };

  return {
    post,
    idle: () => chain,
    pendingCount: () => pending,
  };
}
