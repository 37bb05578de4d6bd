// src/lib/relay/sessionStore.ts
import type { PendingFilePayload } from './types';
import { loadRelayLimits } from './config';

type Entry = { payload: PendingFilePayload; storedAt: number };

type Options = {
  /** 0 以下なら期限なし */
  ttlMs?: number;
  now?: () => number;
};

/**
 * session_id → 次のターンで消費されるアップロード 1 件。
 * put/take は await を挟まないので、別 session のアップロードと relay が
 * 交互に走っても Map が壊れることはない。
 */
export class SessionStore {
  private readonly entries = new Map<string, Entry>();
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor({ ttlMs = 0, now = Date.now }: Options = {}) {
    this.ttlMs = ttlMs;
    this.now = now;
  }

  /** 未消費のものがあっても上書き */
  put(sessionId: string, payload: PendingFilePayload): void {
    const now = this.now();
    this.sweep(now);
    this.entries.set(sessionId, { payload, storedAt: now });
  }

  /** 読み出して削除。無い／期限切れなら null */
  take(sessionId: string): PendingFilePayload | null {
    const entry = this.entries.get(sessionId);
    if (!entry) return null;
    this.entries.delete(sessionId);
    if (this.isExpired(entry, this.now())) return null;
    return entry.payload;
  }

  /** 期限切れを掃除して、消した件数を返す */
  sweep(now: number = this.now()): number {
    if (this.ttlMs <= 0) return 0;
    let removed = 0;
    for (const [id, entry] of this.entries) {
      if (this.isExpired(entry, now)) {
        this.entries.delete(id);
        removed++;
      }
    }
    return removed;
  }

  get size(): number {
    return this.entries.size;
  }

  private isExpired(entry: Entry, now: number) {
    return this.ttlMs > 0 && now - entry.storedAt >= this.ttlMs;
  }
}

// Next.js の route bundle と custom server (server.ts) は別々に module を評価するため、
// プロセス内の 1 インスタンスは global 経由で共有する
declare global {
  // eslint-disable-next-line no-var
  var __relaySessionStore__: SessionStore | undefined;
}

export function getSessionStore(): SessionStore {
  if (!global.__relaySessionStore__) {
    global.__relaySessionStore__ = new SessionStore({
      ttlMs: loadRelayLimits().pendingUploadTtlMs,
    });
  }
  return global.__relaySessionStore__;
}
