import { CancellationError } from "../errors.js";

interface PendingSend<T> {
  value: T;
  resolve: () => void;
}

interface PendingReceive<T> {
  resolve: (value: T) => void;
}

/**
 * Unbuffered hand-off between one producer and one consumer.
 *
 * `send` settles only once a receiver has taken the value, so the producer
 * can never run ahead of the consumer. Both sides give up with a
 * CancellationError when their signal aborts; a value whose send was
 * abandoned is dropped.
 */
export class HandoffChannel<T> {
  private readonly senders: PendingSend<T>[] = [];
  private readonly receivers: PendingReceive<T>[] = [];

  send(value: T, signal: AbortSignal): Promise<void> {
    if (signal.aborted) {
      return Promise.reject(new CancellationError(signal.reason));
    }

    const receiver = this.receivers.shift();
    if (receiver) {
      receiver.resolve(value);
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      const pending: PendingSend<T> = {
        value,
        resolve: () => {
          signal.removeEventListener("abort", onAbort);
          resolve();
        },
      };
      const onAbort = () => {
        remove(this.senders, pending);
        reject(new CancellationError(signal.reason));
      };
      signal.addEventListener("abort", onAbort, { once: true });
      this.senders.push(pending);
    });
  }

  receive(signal: AbortSignal): Promise<T> {
    if (signal.aborted) {
      return Promise.reject(new CancellationError(signal.reason));
    }

    const sender = this.senders.shift();
    if (sender) {
      sender.resolve();
      return Promise.resolve(sender.value);
    }

    return new Promise<T>((resolve, reject) => {
      const pending: PendingReceive<T> = {
        resolve: (value) => {
          signal.removeEventListener("abort", onAbort);
          resolve(value);
        },
      };
      const onAbort = () => {
        remove(this.receivers, pending);
        reject(new CancellationError(signal.reason));
      };
      signal.addEventListener("abort", onAbort, { once: true });
      this.receivers.push(pending);
    });
  }

  /** Senders currently blocked waiting for a receiver. */
  get waitingSenders(): number {
    return this.senders.length;
  }

  get waitingReceivers(): number {
    return this.receivers.length;
  }
}

function remove<T>(list: T[], item: T): void {
  const index = list.indexOf(item);
  if (index >= 0) list.splice(index, 1);
}
