/**
 * Bounded FIFO channel between async producers and consumers.
 *
 * `send` suspends while the buffer is full, `receive` while it is empty.
 * Both take an AbortSignal and give up (without side effects) when it
 * fires. After `close()`, buffered values are still delivered, then every
 * receiver gets `closed`; pending and later sends are refused.
 */

// ============================================================================
// Types
// ============================================================================

export type ReceiveResult<T> =
  | { ok: true; value: T }
  | { ok: false; reason: "closed" | "aborted" };

export type Channel<T> = {
  readonly capacity: number;
  /** Resolves true once the value is buffered or handed to a receiver */
  send: (value: T, signal?: AbortSignal) => Promise<boolean>;
  /** Non-blocking send; false when the buffer is full or the channel closed */
  trySend: (value: T) => boolean;
  receive: (signal?: AbortSignal) => Promise<ReceiveResult<T>>;
  /** Remove and return every buffered value */
  drain: () => T[];
  close: () => void;
  /** Values currently buffered */
  size: () => number;
};

type Slot<T> = { value: T };
type WaitingSender<T> = Slot<T> & { resolve: (sent: boolean) => void };
type WaitingReceiver<T> = (result: ReceiveResult<T>) => void;

// ============================================================================
// Factory
// ============================================================================

export const createChannel = <T>(capacity: number): Channel<T> => {
  if (!Number.isInteger(capacity) || capacity < 1) {
    throw new Error(`channel capacity must be a positive integer, got ${capacity}`);
  }

  // Boxed: T may itself include undefined.
  const buffer: Slot<T>[] = [];
  const senders: WaitingSender<T>[] = [];
  const receivers: WaitingReceiver<T>[] = [];
  let closed = false;

  const remove = <W>(queue: W[], item: W): void => {
    const i = queue.indexOf(item);
    if (i >= 0) queue.splice(i, 1);
  };

  /** Move blocked senders into freed buffer slots */
  const admitSenders = (): void => {
    while (buffer.length < capacity) {
      const sender = senders.shift();
      if (!sender) return;
      buffer.push({ value: sender.value });
      sender.resolve(true);
    }
  };

  const trySend = (value: T): boolean => {
    if (closed) return false;
    const receiver = receivers.shift();
    if (receiver) {
      receiver({ ok: true, value });
      return true;
    }
    if (buffer.length < capacity) {
      buffer.push({ value });
      return true;
    }
    return false;
  };

  return {
    capacity,

    send(value, signal) {
      if (signal?.aborted) return Promise.resolve(false);
      if (trySend(value)) return Promise.resolve(true);
      if (closed) return Promise.resolve(false);

      return new Promise<boolean>((resolve) => {
        const sender: WaitingSender<T> = {
          value,
          resolve: (sent) => {
            signal?.removeEventListener("abort", onAbort);
            resolve(sent);
          },
        };
        const onAbort = () => {
          remove(senders, sender);
          resolve(false);
        };
        senders.push(sender);
        signal?.addEventListener("abort", onAbort, { once: true });
      });
    },

    trySend,

    receive(signal) {
      if (signal?.aborted) return Promise.resolve({ ok: false, reason: "aborted" });
      const slot = buffer.shift();
      if (slot) {
        admitSenders();
        return Promise.resolve({ ok: true, value: slot.value });
      }
      if (closed) return Promise.resolve({ ok: false, reason: "closed" });

      return new Promise<ReceiveResult<T>>((resolve) => {
        const receiver: WaitingReceiver<T> = (result) => {
          signal?.removeEventListener("abort", onAbort);
          resolve(result);
        };
        const onAbort = () => {
          remove(receivers, receiver);
          resolve({ ok: false, reason: "aborted" });
        };
        receivers.push(receiver);
        signal?.addEventListener("abort", onAbort, { once: true });
      });
    },

    drain() {
      const values = buffer.splice(0, buffer.length).map((slot) => slot.value);
      admitSenders();
      return values;
    },

    close() {
      if (closed) return;
      closed = true;
      for (const receiver of receivers.splice(0)) {
        receiver({ ok: false, reason: "closed" });
      }
      for (const sender of senders.splice(0)) {
        sender.resolve(false);
      }
    },

    size: () => buffer.length,
  };
};
