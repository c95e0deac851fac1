/**
 * Notification queue for BLE payloads.
 *
 * The adapter delivers notifications through a callback. This queue buffers
 * them and provides a Promise-based interface for the single consumer, with
 * timeout and abort support.
 */

/**
 * Result of waiting on the queue.
 */
export type DequeueResult =
  | { kind: 'data'; data: Uint8Array }
  | { kind: 'closed'; reason: string }
  | { kind: 'timeout' };

interface PendingConsumer {
  resolve: (result: DequeueResult) => void;
  cleanup: () => void;
}

/**
 * Queue for managing BLE notification payloads.
 *
 * - Buffers payloads that arrive before being requested
 * - Queues consumers waiting for future payloads
 * - Once closed, drains what is buffered and then reports `closed`
 */
export class NotificationQueue {
  static readonly DEFAULT_MAX_SIZE = 1024;

  private queue: Uint8Array[] = [];
  private pending: PendingConsumer[] = [];
  private closedReason: string | null = null;
  private droppedCount = 0;

  constructor(private readonly maxSize: number = NotificationQueue.DEFAULT_MAX_SIZE) {}

  /**
   * Add a payload to the queue.
   *
   * Resolves the oldest waiting consumer if there is one, otherwise buffers.
   * When the buffer is full the oldest payload is dropped.
   *
   * @param data - Notification payload
   */
  enqueue(data: Uint8Array): void {
    if (this.closedReason !== null) {
      return;
    }

    const consumer = this.pending.shift();
    if (consumer) {
      consumer.cleanup();
      consumer.resolve({ kind: 'data', data });
      return;
    }

    if (this.queue.length >= this.maxSize) {
      this.queue.shift();
      this.droppedCount++;
      console.warn(`Notification queue full (${this.maxSize}), dropped oldest payload`);
    }
    this.queue.push(data);
  }

  /**
   * Get the next payload.
   *
   * @param timeoutMs - Maximum time to wait; undefined waits indefinitely
   * @param signal - Rejects with signal.reason when aborted
   * @returns The payload, `closed` once the queue is closed and drained, or
   *   `timeout`
   */
  dequeue(timeoutMs?: number, signal?: AbortSignal): Promise<DequeueResult> {
    if (signal?.aborted) {
      return Promise.reject(signal.reason);
    }

    const buffered = this.queue.shift();
    if (buffered) {
      return Promise.resolve({ kind: 'data', data: buffered });
    }

    if (this.closedReason !== null) {
      return Promise.resolve({ kind: 'closed', reason: this.closedReason });
    }

    return new Promise<DequeueResult>((resolve, reject) => {
      let timeoutId: ReturnType<typeof setTimeout> | undefined;

      const consumer: PendingConsumer = {
        resolve,
        cleanup: () => {
          if (timeoutId !== undefined) clearTimeout(timeoutId);
          signal?.removeEventListener('abort', onAbort);
        },
      };

      const remove = () => {
        const index = this.pending.indexOf(consumer);
        if (index !== -1) this.pending.splice(index, 1);
        consumer.cleanup();
      };

      const onAbort = () => {
        remove();
        reject(signal?.reason);
      };

      if (timeoutMs !== undefined) {
        timeoutId = setTimeout(() => {
          remove();
          resolve({ kind: 'timeout' });
        }, timeoutMs);
      }
      signal?.addEventListener('abort', onAbort, { once: true });

      this.pending.push(consumer);
    });
  }

  /**
   * Close the queue.
   *
   * Waiting consumers resolve with `closed`; buffered payloads remain
   * available to later `dequeue` calls. Later calls are no-ops.
   *
   * @param reason - Reason for closing (default: "Connection closed")
   */
  close(reason: string = 'Connection closed'): void {
    if (this.closedReason !== null) {
      return;
    }
    this.closedReason = reason;

    for (const consumer of this.pending) {
      consumer.cleanup();
      consumer.resolve({ kind: 'closed', reason });
    }
    this.pending = [];
  }

  /**
   * Drop buffered payloads without closing.
   */
  clear(): void {
    this.queue = [];
  }

  get isClosed(): boolean {
    return this.closedReason !== null;
  }

  /**
   * Number of buffered payloads.
   */
  get size(): number {
    return this.queue.length;
  }

  /**
   * Number of consumers waiting for payloads.
   */
  get pendingCount(): number {
    return this.pending.length;
  }

  /**
   * Payloads dropped because the buffer was full.
   */
  get dropped(): number {
    return this.droppedCount;
  }
}
