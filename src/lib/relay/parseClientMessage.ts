// src/lib/relay/parseClientMessage.ts
import type { ParsedClientMessage } from './types';

const isRecord = (v: unknown): v is Record<string, unknown> =>
  typeof v === 'object' && v !== null && !Array.isArray(v);

/**
 * WebSocket の 1 フレームを解釈する。
 * JSON オブジェクトとして読めなければ、生の文字列をそのまま本文として扱う。
 */
export function parseClientMessage(raw: string): ParsedClientMessage {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch {
    return { text: raw, structured: false, sessionId: null };
  }
  if (!isRecord(data)) {
    return { text: raw, structured: false, sessionId: null };
  }

  const text = typeof data.text === 'string' ? data.text : '';
  const sessionId = typeof data.session_id === 'string' ? data.session_id : null;
  return { text, structured: true, sessionId };
}
