// src/lib/relay/fileProcessor.ts
// アップロードされたバイト列 → プロンプトに載せられる形（PendingFilePayload）
import type { FileCategory, PendingFilePayload } from './types';

export const PDF_TEXT_LIMIT = 15000;
export const PDF_EXTRACT_FALLBACK = 'Could not extract text from the PDF file.';

export class UnsupportedFileTypeError extends Error {
  readonly mime: string;
  constructor(mime: string) {
    super('Unsupported file type.');
    this.name = 'UnsupportedFileTypeError';
    this.mime = mime;
  }
}

/** PDF → ページ順のテキスト配列。テストでは差し替える */
export type PdfPageExtractor = (bytes: Uint8Array) => Promise<string[]>;

export function classifyMime(mime: string): FileCategory | null {
  const m = mime.trim().toLowerCase();
  if (m.startsWith('image/')) return 'image';
  if (m === 'application/pdf') return 'pdf';
  return null;
}

export function imageToDataUrl(bytes: Uint8Array, mime: string): string {
  const b64 = Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('base64');
  return `data:${mime};base64,${b64}`;
}

/** サロゲートペアを割らないように code point 単位で切る */
export function truncateChars(text: string, limit: number): string {
  if (text.length <= limit) return text;
  return Array.from(text).slice(0, limit).join('');
}

export const extractPdfPages: PdfPageExtractor = async (bytes) => {
  const pdfjs = await import('pdfjs-dist/legacy/build/pdf.mjs');
  // pdfjs は渡したバッファを worker 側へ移すのでコピーを渡す
  const task = pdfjs.getDocument({
    data: new Uint8Array(bytes),
    isEvalSupported: false,
    useSystemFonts: true,
  });
  try {
    const doc = await task.promise;
    const pages: string[] = [];
    for (let i = 1; i <= doc.numPages; i++) {
      const page = await doc.getPage(i);
      const content = await page.getTextContent();
      let text = '';
      for (const item of content.items) {
        if (!('str' in item)) continue;
        text += item.str;
        if (item.hasEOL) text += '\n';
      }
      pages.push(text.endsWith('\n') || !text ? text : `${text}\n`);
      page.cleanup();
    }
    return pages;
  } finally {
    await task.destroy();
  }
};

/**
 * 全ページのテキストを連結して先頭 15,000 文字に切る。
 * 抽出に失敗したら固定文言を返す（throw しない）。
 */
export async function extractPdfText(
  bytes: Uint8Array,
  extractPages: PdfPageExtractor = extractPdfPages,
): Promise<string> {
  try {
    const pages = await extractPages(bytes);
    return truncateChars(pages.join(''), PDF_TEXT_LIMIT);
  } catch (e) {
    console.warn('[fileProcessor] ⚠ PDF extraction error:', e instanceof Error ? e.message : e);
    return PDF_EXTRACT_FALLBACK;
  }
}

export function wrapPdfText(extracted: string): string {
  return `The user uploaded a PDF. The extracted text is as follows:\n---\n${extracted}\n---\n`;
}

export async function processUpload(
  bytes: Uint8Array,
  mime: string,
  extractPages?: PdfPageExtractor,
): Promise<PendingFilePayload> {
  const category = classifyMime(mime);

  if (category === 'image') {
    return { kind: 'image', mime, dataUrl: imageToDataUrl(bytes, mime) };
  }
  if (category === 'pdf') {
    const text = await extractPdfText(bytes, extractPages);
    return { kind: 'pdf', text: wrapPdfText(text) };
  }
  throw new UnsupportedFileTypeError(mime);
}
