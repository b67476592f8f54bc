// Unbounded single-producer/single-consumer channel

export class ChannelClosedError extends Error {
  constructor(public reason?: Error) {
    super(reason ? `Channel closed: ${reason.message}` : 'Channel closed');
    this.name = 'ChannelClosedError';
  }
}

interface PendingReceive<T> {
  resolve: (value: T) => void;
  reject: (reason: Error) => void;
}

/**
 * FIFO message queue between one producer and one consumer. `send` never blocks;
 * `recv` waits until a message is available.
 */
export class Channel<T> {
  private buffer: T[] = [];
  private waiting: PendingReceive<T> | undefined;
  private closedWith: ChannelClosedError | undefined;

  send(message: T): void {
    if (this.closedWith) {
      throw this.closedWith;
    }

    const receiver = this.waiting;
    if (receiver) {
      this.waiting = undefined;
      receiver.resolve(message);
      return;
    }
    this.buffer.push(message);
  }

  recv(): Promise<T> {
    if (this.buffer.length > 0) {
      const [next] = this.buffer.splice(0, 1);
      return Promise.resolve(next);
    }
    if (this.closedWith) {
      return Promise.reject(this.closedWith);
    }
    if (this.waiting) {
      return Promise.reject(new Error('Channel already has a pending receiver'));
    }

    return new Promise<T>((resolve, reject) => {
      this.waiting = { resolve, reject };
    });
  }

  /**
   * Close the channel. Buffered messages can still be received; after that `recv` rejects.
   */
  close(reason?: Error): void {
    if (this.closedWith) return;
    this.closedWith = new ChannelClosedError(reason);

    const receiver = this.waiting;
    if (receiver) {
      this.waiting = undefined;
      receiver.reject(this.closedWith);
    }
  }

  get size(): number {
    return this.buffer.length;
  }

  get closed(): boolean {
    return this.closedWith !== undefined;
  }
}
