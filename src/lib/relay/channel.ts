// src/lib/relay/channel.ts
// 双方向のテキストチャネル。ws のイベント駆動を「1 件ずつ待つ」形に直す。

export class ChannelClosedError extends Error {
  constructor() {
    super('channel closed');
    this.name = 'ChannelClosedError';
  }
}

export interface ClientChannel {
  /** 次のメッセージ。切断済みなら null */
  receive(): Promise<string | null>;
  /** 切断済みなら ChannelClosedError で reject */
  send(text: string): Promise<void>;
  close(code?: number, reason?: string): void;
  readonly closed: boolean;
  /** 切断で abort される（upstream の中断用） */
  readonly signal: AbortSignal;
}

/** 実際の送信先（ws.WebSocket など） */
export type ChannelTransport = {
  send(text: string, cb: (err?: Error) => void): void;
  close(code?: number, reason?: string): void;
};

export class QueuedChannel implements ClientChannel {
  private readonly inbox: string[] = [];
  private readonly waiters: Array<(msg: string | null) => void> = [];
  private readonly controller = new AbortController();

  constructor(private readonly transport: ChannelTransport) {}

  get closed(): boolean {
    return this.controller.signal.aborted;
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  /** transport から届いたメッセージを積む */
  deliver(text: string): void {
    if (this.closed) return;
    const waiter = this.waiters.shift();
    if (waiter) waiter(text);
    else this.inbox.push(text);
  }

  /** transport 側で切断された */
  end(): void {
    if (this.closed) return;
    this.controller.abort(new ChannelClosedError());
    for (const waiter of this.waiters.splice(0)) waiter(null);
  }

  receive(): Promise<string | null> {
    if (this.closed) return Promise.resolve(null);
    const queued = this.inbox.shift();
    if (queued !== undefined) return Promise.resolve(queued);
    return new Promise((resolve) => this.waiters.push(resolve));
  }

  send(text: string): Promise<void> {
    if (this.closed) return Promise.reject(new ChannelClosedError());
    return new Promise((resolve, reject) => {
      this.transport.send(text, (err) => {
        if (!err) return resolve();
        // 送信中に切れた場合は切断として扱う
        this.end();
        reject(new ChannelClosedError());
      });
    });
  }

  close(code?: number, reason?: string): void {
    if (this.closed) return;
    this.end();
    this.transport.close(code, reason);
  }
}
