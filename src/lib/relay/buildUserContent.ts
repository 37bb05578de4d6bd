// src/lib/relay/buildUserContent.ts
import type { PendingFilePayload, UserContentPart } from './types';

export const DEFAULT_IMAGE_PROMPT = 'Analyze this image and respond to my prompt.';
export const PDF_PROMPT_SEPARATOR = '\n\nUser prompt: ';

/**
 * ユーザー入力 + 保留中ファイル → user ターンの content。
 * どちらも無ければ null（ターン自体をスキップ）。
 */
export function buildUserContent(
  text: string,
  pending: PendingFilePayload | null,
): UserContentPart[] | null {
  if (pending?.kind === 'image') {
    return [
      { type: 'text', text: text || DEFAULT_IMAGE_PROMPT },
      { type: 'image_url', image_url: { url: pending.dataUrl } },
    ];
  }
  if (pending?.kind === 'pdf') {
    return [{ type: 'text', text: pending.text + PDF_PROMPT_SEPARATOR + text }];
  }
  if (text) return [{ type: 'text', text }];
  return null;
}
