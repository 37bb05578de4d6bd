// src/lib/relay/sessionId.ts

export const SESSION_ID_MAX_LENGTH = 128;

/** クライアント指定の session_id を整える。使えなければ null */
export function normalizeSessionId(raw: string | null | undefined): string | null {
  const id = (raw ?? '').trim();
  if (!id || id.length > SESSION_ID_MAX_LENGTH) return null;
  return id;
}
