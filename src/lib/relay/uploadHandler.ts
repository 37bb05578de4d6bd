// src/lib/relay/uploadHandler.ts
import { NextResponse } from 'next/server';
import { processUpload, UnsupportedFileTypeError, type PdfPageExtractor } from './fileProcessor';
import type { SessionStore } from './sessionStore';
import { normalizeSessionId } from './sessionId';

type UploadOptions = {
  maxUploadBytes: number;
  extractPages?: PdfPageExtractor;
};

const DESCRIPTION = { image: 'an image', pdf: 'a PDF' } as const;

// multipart の境界・ヘッダぶんの余裕
const MULTIPART_OVERHEAD_BYTES = 16 * 1024;

/** content-length の申告だけで上限超過が分かるか（本文を読む前に弾く） */
export function exceedsDeclaredLength(headers: Headers, maxUploadBytes: number): boolean {
  const raw = headers.get('content-length');
  if (raw === null) return false;
  const declared = Number(raw);
  return Number.isFinite(declared) && declared > maxUploadBytes + MULTIPART_OVERHEAD_BYTES;
}

/**
 * POST /api/upload（multipart: file, session_id）
 * 処理済みファイルを store に置き、次のチャットターンで消費させる。
 */
export function createUploadHandler(store: SessionStore, opts: UploadOptions) {
  return async function POST(req: Request): Promise<Response> {
    if (exceedsDeclaredLength(req.headers, opts.maxUploadBytes)) {
      console.warn('[upload] ⚠ rejected by content-length:', req.headers.get('content-length'));
      return NextResponse.json({ error: 'File too large.' }, { status: 413 });
    }

    let form: FormData;
    try {
      form = await req.formData();
    } catch {
      return NextResponse.json({ error: 'multipart/form-data body is required.' }, { status: 400 });
    }

    const file = form.get('file');
    const rawSessionId = form.get('session_id');
    const sessionId = typeof rawSessionId === 'string' ? normalizeSessionId(rawSessionId) : null;

    if (!(file instanceof File) || !sessionId) {
      console.error('[upload] ❌ file または session_id が不足しています');
      return NextResponse.json({ error: 'file and session_id are required.' }, { status: 400 });
    }
    console.log(`[upload] Received file upload for session_id: ${sessionId}`);

    if (file.size > opts.maxUploadBytes) {
      return NextResponse.json({ error: 'File too large.' }, { status: 413 });
    }

    const mime = file.type;
    try {
      const bytes = new Uint8Array(await file.arrayBuffer());
      const payload = await processUpload(bytes, mime, opts.extractPages);
      store.put(sessionId, payload);

      console.log(`[upload] ✅ stored ${payload.kind} for ${sessionId}`);
      return NextResponse.json({
        message: `Successfully uploaded and processed ${DESCRIPTION[payload.kind]}.`,
        file_type: mime,
        category: payload.kind,
        session_id: sessionId,
      });
    } catch (e) {
      if (e instanceof UnsupportedFileTypeError) {
        console.warn(`[upload] ⚠ unsupported type "${e.mime}" for ${sessionId}`);
        return NextResponse.json({ error: e.message }, { status: 400 });
      }
      throw e;
    }
  };
}
