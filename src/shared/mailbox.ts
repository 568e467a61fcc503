/**
 * Mailbox — single-consumer message queue
 *
 * Messages are handled strictly one at a time, in post order. post() never
 * blocks the sender: draining starts on a microtask. A handler that throws
 * is reported through onError and the next message is processed.
 */
export type MailboxErrorHandler<T> = (err: unknown, message: T | null) => void;

export class Mailbox<T extends object> {
  private readonly queue: T[] = [];
  private draining = false;
  private closed = false;

  constructor(
    private readonly handler: (message: T) => void | Promise<void>,
    private readonly onError: MailboxErrorHandler<T>,
  ) {}

  /** Number of messages waiting to be handled */
  get size(): number {
    return this.queue.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Enqueue a message. Returns false once the mailbox is closed. */
  post(message: T): boolean {
    if (this.closed) return false;

    this.queue.push(message);
    if (!this.draining) {
      this.draining = true;
      queueMicrotask(() => {
        this.drain().catch((err: unknown) => this.onError(err, null));
      });
    }
    return true;
  }

  /** Stop accepting messages. Returns the messages that were never handled. */
  close(): T[] {
    this.closed = true;
    return this.queue.splice(0);
  }

  private async drain(): Promise<void> {
    try {
      let message = this.queue.shift();
      while (message !== undefined) {
        try {
          await this.handler(message);
        } catch (err) {
          this.onError(err, message);
        }
        if (this.closed) break;
        message = this.queue.shift();
      }
    } finally {
      this.draining = false;
    }
  }
}
