// src/lib/relay/config.ts
// 環境変数 → RelayConfig。起動時に 1 回だけ読む。

export const DEFAULT_MODEL = 'gpt-4o-mini';

export const DEFAULT_SYSTEM_PROMPT =
  "If the user provides a blood test image or PDF, summarize the results and provide general, non-medical advice. Don't respond to anything not blood test related. Keep it short. Be helpful.";

/** API キー不要の上限値（upload route 側でも読む） */
export type RelayLimits = {
  maxHistoryMessages: number;
  pendingUploadTtlMs: number;
  maxUploadBytes: number;
};

export type RelayConfig = RelayLimits & {
  openaiApiKey: string;
  model: string;
  systemPrompt: string;
  port: number;
  hostname: string;
};

type Env = Record<string, string | undefined>;

const num = (v: string | undefined, def: number) => {
  if (v === undefined || v.trim() === '') return def;
  const n = Number(v);
  return Number.isFinite(n) && n > 0 ? n : def;
};

const str = (v: string | undefined, def: string) => {
  const s = (v ?? '').trim();
  return s || def;
};

export function loadRelayLimits(env: Env = process.env): RelayLimits {
  return {
    maxHistoryMessages: Math.floor(num(env.CHAT_MAX_HISTORY_MESSAGES, 40)),
    pendingUploadTtlMs: num(env.PENDING_UPLOAD_TTL_MS, 30 * 60 * 1000),
    maxUploadBytes: num(env.MAX_UPLOAD_BYTES, 20 * 1024 * 1024),
  };
}

export function loadRelayConfig(env: Env = process.env): RelayConfig {
  const openaiApiKey = (env.OPENAI_API_KEY ?? '').trim();
  if (!openaiApiKey) throw new Error('Missing env: OPENAI_API_KEY');

  return {
    openaiApiKey,
    model: str(env.OPENAI_MODEL, DEFAULT_MODEL),
    systemPrompt: str(env.CHAT_SYSTEM_PROMPT, DEFAULT_SYSTEM_PROMPT),
    ...loadRelayLimits(env),
    port: Math.floor(num(env.PORT, 3000)),
    hostname: str(env.HOSTNAME, 'localhost'),
  };
}
