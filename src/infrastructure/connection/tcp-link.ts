import net from 'node:net';
import type { Duplex } from 'node:stream';
import type { BrokerEndpoint } from '../../domain/endpoint.js';
import { endpointKey } from '../../domain/endpoint.js';
import { ConnectionUnavailableError, OperationTimeoutError } from '../../domain/errors.js';
import type { LinkFactory } from '../../domain/ports.js';

export type ReadOptions = Readonly<{
  /** Aborting makes `readFrame` resolve null. */
  signal?: AbortSignal | undefined;
  /** Rejects with OperationTimeoutError when no frame arrives in time. */
  timeoutMs?: number | undefined;
}>;

type Wake = 'data' | 'aborted' | 'timeout';

/**
 * A socket carrying size-prefixed frames (`u32 size | size bytes`).
 *
 * Incoming bytes are reassembled into whole frames and queued. There is a
 * single reader at a time, which holds because links are leased exclusively.
 */
export class TcpLink {
  private pending: Buffer = Buffer.alloc(0);
  private readonly frames: Buffer[] = [];
  private waiter: (() => void) | undefined;
  private failure: Error | undefined;
  private ended = false;

  constructor(
    private readonly socket: Duplex,
    readonly endpoint: string,
  ) {
    socket.on('data', (chunk: Buffer) => this.onData(chunk));
    socket.on('error', (err: Error) => {
      this.failure = err;
      this.wake();
    });
    socket.on('close', () => {
      this.ended = true;
      this.wake();
    });
  }

  static connect(endpoint: BrokerEndpoint, timeoutMs: number): Promise<TcpLink> {
    const key = endpointKey(endpoint);
    return new Promise((resolve, reject) => {
      const socket = net.connect({ host: endpoint.host, port: endpoint.port });
      const timer = setTimeout(() => {
        socket.destroy();
        reject(new OperationTimeoutError(`connect ${key}`, timeoutMs));
      }, timeoutMs);

      socket.once('connect', () => {
        clearTimeout(timer);
        socket.removeListener('error', onError);
        socket.setNoDelay(true);
        resolve(new TcpLink(socket, key));
      });
      const onError = (err: Error): void => {
        clearTimeout(timer);
        reject(new ConnectionUnavailableError(key, err.message, { cause: err }));
      };
      socket.once('error', onError);
    });
  }

  get isOpen(): boolean {
    return !this.ended && this.failure === undefined && !this.socket.destroyed;
  }

  /** Frames received but not read yet. */
  get queued(): number {
    return this.frames.length;
  }

  write(data: Buffer): Promise<void> {
    return new Promise((resolve, reject) => {
      if (!this.isOpen) {
        reject(this.closedError());
        return;
      }
      this.socket.write(data, (err) => {
        if (err) reject(new ConnectionUnavailableError(this.endpoint, err.message, { cause: err }));
        else resolve();
      });
    });
  }

  async readFrame(options: ReadOptions = {}): Promise<Buffer | null> {
    const deadline = options.timeoutMs === undefined ? undefined : Date.now() + options.timeoutMs;
    for (;;) {
      const frame = this.frames.shift();
      if (frame) return frame;
      if (!this.isOpen) throw this.closedError();
      if (options.signal?.aborted) return null;

      const remaining = deadline === undefined ? undefined : deadline - Date.now();
      const woke = await this.waitForData(options.signal, remaining);
      if (woke === 'aborted') return null;
      if (woke === 'timeout' && options.timeoutMs !== undefined) {
        throw new OperationTimeoutError(`read from ${this.endpoint}`, options.timeoutMs);
      }
    }
  }

  /** Removes and returns every queued frame without waiting. */
  drainFrames(): Buffer[] {
    return this.frames.splice(0, this.frames.length);
  }

  async close(): Promise<void> {
    if (this.ended) return;
    this.ended = true;
    this.socket.destroy();
    this.wake();
  }

  private closedError(): ConnectionUnavailableError {
    return this.failure
      ? new ConnectionUnavailableError(this.endpoint, this.failure.message, { cause: this.failure })
      : new ConnectionUnavailableError(this.endpoint, 'link closed');
  }

  private onData(chunk: Buffer): void {
    this.pending = this.pending.length === 0 ? chunk : Buffer.concat([this.pending, chunk]);
    let received = false;
    while (this.pending.length >= 4) {
      const size = this.pending.readUInt32BE(0);
      if (this.pending.length < 4 + size) break;
      this.frames.push(Buffer.from(this.pending.subarray(4, 4 + size)));
      this.pending = this.pending.subarray(4 + size);
      received = true;
    }
    if (received) this.wake();
  }

  private wake(): void {
    const waiter = this.waiter;
    this.waiter = undefined;
    waiter?.();
  }

  private waitForData(signal: AbortSignal | undefined, timeoutMs: number | undefined): Promise<Wake> {
    if (timeoutMs !== undefined && timeoutMs <= 0) return Promise.resolve('timeout');

    return new Promise((resolve) => {
      let timer: NodeJS.Timeout | undefined;
      const finish = (reason: Wake): void => {
        if (timer) clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        if (this.waiter === onData) this.waiter = undefined;
        resolve(reason);
      };
      const onData = (): void => finish('data');
      const onAbort = (): void => finish('aborted');

      this.waiter = onData;
      signal?.addEventListener('abort', onAbort, { once: true });
      if (timeoutMs !== undefined) timer = setTimeout(() => finish('timeout'), timeoutMs);
    });
  }
}

export function tcpLinkFactory(connectTimeoutMs: number): LinkFactory<TcpLink> {
  return {
    dial: (endpoint) => TcpLink.connect(endpoint, connectTimeoutMs),
    isOpen: (link) => link.isOpen,
    close: (link) => link.close(),
  };
}
