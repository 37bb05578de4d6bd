// src/lib/relay/relayLoop.ts
// 1 接続 = 1 ループ。
//   AWAITING_MESSAGE → BUILDING_PROMPT → STREAMING_RESPONSE → AWAITING_MESSAGE …
//   切断 / 想定外エラーで CLOSED
import { ChannelClosedError, type ClientChannel } from './channel';
import { buildUserContent } from './buildUserContent';
import { Conversation } from './conversation';
import { parseClientMessage } from './parseClientMessage';
import type { SessionStore } from './sessionStore';
import type { CompletionSource } from './upstream';

export type RelayState = 'AWAITING_MESSAGE' | 'BUILDING_PROMPT' | 'STREAMING_RESPONSE' | 'CLOSED';

export type RelayDeps = {
  sessionId: string;
  channel: ClientChannel;
  store: SessionStore;
  upstream: CompletionSource;
  systemPrompt: string;
  maxHistoryMessages?: number;
  /** テスト・デバッグ用 */
  conversation?: Conversation;
  onStateChange?: (state: RelayState) => void;
};

export type RelayResult = {
  turns: number;
  /** 想定外エラーで終わったときのみ */
  error: Error | null;
};

/** 1 ターン分。null を返したらスキップ（upstream 未呼び出し） */
async function runTurn(raw: string, deps: RelayDeps, conversation: Conversation) {
  const { sessionId, channel, store, upstream } = deps;

  deps.onStateChange?.('BUILDING_PROMPT');
  const msg = parseClientMessage(raw);
  if (msg.sessionId && msg.sessionId !== sessionId) {
    console.warn(`[relay] payload session_id mismatch (${msg.sessionId}) on ${sessionId}`);
  }

  // JSON で来たターンだけ保留ファイルを消費する（本文が空でも消える）
  const pending = msg.structured ? store.take(sessionId) : null;
  const content = buildUserContent(msg.text, pending);
  if (!content) return null;

  conversation.append({ role: 'user', content });

  deps.onStateChange?.('STREAMING_RESPONSE');
  let full = '';
  for await (const fragment of upstream.stream(conversation.snapshot(), channel.signal)) {
    if (!fragment) continue;
    await channel.send(fragment);
    full += fragment;
  }

  if (full) conversation.append({ role: 'assistant', content: full });
  return full;
}

export async function runRelay(deps: RelayDeps): Promise<RelayResult> {
  const { sessionId, channel } = deps;
  const conversation =
    deps.conversation ?? new Conversation(deps.systemPrompt, deps.maxHistoryMessages);

  let turns = 0;
  try {
    for (;;) {
      deps.onStateChange?.('AWAITING_MESSAGE');
      const raw = await channel.receive();
      if (raw === null) break;

      const reply = await runTurn(raw, deps, conversation);
      if (reply !== null) turns++;
    }
    console.log(`[relay] Client ${sessionId} disconnected.`);
    return { turns, error: null };
  } catch (e) {
    // 切断（受信/送信中、または切断による upstream の abort）は正常終了
    if (e instanceof ChannelClosedError || channel.closed) {
      console.log(`[relay] Client ${sessionId} disconnected.`);
      return { turns, error: null };
    }

    const error = e instanceof Error ? e : new Error(String(e));
    console.error(`[relay] ❌ An error occurred for ${sessionId}:`, error.message);
    try {
      await channel.send(`ERROR: ${error.message}`);
    } catch (sendErr) {
      console.warn('[relay] ⚠ could not report error to client:', sendErr instanceof Error ? sendErr.message : sendErr);
    }
    channel.close(1011, 'relay error');
    return { turns, error };
  } finally {
    deps.onStateChange?.('CLOSED');
  }
}
