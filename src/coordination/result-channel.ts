/**
 * Unbounded single-consumer channel. Producers `send`; the consumer pulls
 * with `receive`, which resolves with the next message in arrival order.
 */
export class ResultChannel<T> {
  private buffer: T[] = [];
  private receivers: Array<(message: T) => void> = [];
  private closed = false;

  send(message: T): void {
    if (this.closed) return;
    const receiver = this.receivers.shift();
    if (receiver) {
      receiver(message);
    } else {
      this.buffer.push(message);
    }
  }

  receive(): Promise<T> {
    const message = this.buffer.shift();
    if (message !== undefined) {
      return Promise.resolve(message);
    }
    if (this.closed) {
      return Promise.reject(new Error('Channel closed'));
    }
    return new Promise<T>((resolve) => {
      this.receivers.push(resolve);
    });
  }

  get size(): number {
    return this.buffer.length;
  }

  close(): void {
    this.closed = true;
  }
}
