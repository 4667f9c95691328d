export class ChannelClosedError extends Error {
  constructor(message = 'channel is closed') {
    super(message);
    this.name = 'ChannelClosedError';
  }
}

/**
 * A producer handle on a {@link Channel}. Each handle must be closed exactly once;
 * `close` is idempotent.
 */
export interface Sender<T> {
  send(value: T): void;
  /** Another handle on the same channel, kept open independently of this one. */
  clone(): Sender<T>;
  close(): void;
  readonly closed: boolean;
}

/**
 * Unbounded multi-producer, single-consumer queue.
 *
 * Senders are counted: the channel closes when the last open sender closes, after which
 * {@link receive} yields what is still buffered and then ends. A channel that has never handed
 * out a sender stays open.
 */
export class Channel<T> {
  private readonly queue: T[] = [];
  private openSenders = 0;
  private closed = false;
  private receiving = false;
  private resolveNext: (() => void) | null = null;

  sender(): Sender<T> {
    if (this.closed) {
      throw new ChannelClosedError();
    }
    this.openSenders++;
    let open = true;
    const handle: Sender<T> = {
      send: (value: T) => {
        if (!open) throw new ChannelClosedError('send on a closed sender');
        this.queue.push(value);
        this.wake();
      },
      clone: () => {
        if (!open) throw new ChannelClosedError('clone of a closed sender');
        return this.sender();
      },
      close: () => {
        if (!open) return;
        open = false;
        this.openSenders--;
        if (this.openSenders === 0) {
          this.closed = true;
          this.wake();
        }
      },
      get closed() {
        return !open;
      },
    };
    return handle;
  }

  /** Messages buffered and not yet received. */
  get size(): number {
    return this.queue.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  async *receive(): AsyncGenerator<T, void, undefined> {
    if (this.receiving) {
      throw new Error('channel already has a receiver');
    }
    this.receiving = true;

    while (!this.closed || this.queue.length > 0) {
      if (this.queue.length > 0) {
        const [value] = this.queue.splice(0, 1);
        yield value;
      } else {
        await new Promise<void>((r) => (this.resolveNext = r));
      }
    }
  }

  private wake(): void {
    if (this.resolveNext) {
      this.resolveNext();
      this.resolveNext = null;
    }
  }
}
