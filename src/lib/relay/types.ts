// src/lib/relay/types.ts

/** user ターンの content part（OpenAI chat.completions の形に合わせる） */
export type TextPart = { type: 'text'; text: string };
export type ImagePart = { type: 'image_url'; image_url: { url: string } };
export type UserContentPart = TextPart | ImagePart;

export type SystemMessage = { role: 'system'; content: string };
export type UserMessage = { role: 'user'; content: UserContentPart[] };
export type AssistantMessage = { role: 'assistant'; content: string };

export type ChatMessage = SystemMessage | UserMessage | AssistantMessage;

/**
 * アップロード済みで、次のターンに消費されるのを待っているファイル
 * - image: data URL（mime を自己記述）
 * - pdf: 抽出テキスト（前置き付き）
 */
export type PendingFilePayload =
  | { kind: 'image'; mime: string; dataUrl: string }
  | { kind: 'pdf'; text: string };

export type FileCategory = PendingFilePayload['kind'];

/** クライアント → サーバの 1 フレームを解釈した結果 */
export type ParsedClientMessage = {
  text: string;
  /** JSON として読めたか（false のときは添付を消費しない） */
  structured: boolean;
  sessionId: string | null;
};
