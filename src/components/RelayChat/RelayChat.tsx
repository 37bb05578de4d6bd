// src/components/RelayChat/RelayChat.tsx
'use client';

import React, { useCallback, useEffect, useRef, useState } from 'react';
import './RelayChat.css';

type Sender = 'user' | 'bot';
type ChatLine = { id: number; sender: Sender; text: string; streaming?: boolean };

type UploadResult = {
  message: string;
  file_type: string;
  category: 'image' | 'pdf';
  session_id: string;
};

type Props = { model: string };

const wsUrl = (sessionId: string) => {
  const protocol = window.location.protocol === 'https:' ? 'wss:' : 'ws:';
  return `${protocol}//${window.location.host}/ws?session_id=${encodeURIComponent(sessionId)}`;
};

export default function RelayChat({ model }: Props) {
  const [lines, setLines] = useState<ChatLine[]>([
    { id: 0, sender: 'bot', text: '🤖 Initializing connection...' },
  ]);
  const [connected, setConnected] = useState(false);
  const [text, setText] = useState('');
  const [uploadStatus, setUploadStatus] = useState('');
  const [uploaded, setUploaded] = useState<UploadResult | null>(null);

  const sessionIdRef = useRef('');
  const wsRef = useRef<WebSocket | null>(null);
  const nextIdRef = useRef(1);
  // 次に届く断片をどの行に足すか（送信ごとにリセット）
  const streamingIdRef = useRef<number | null>(null);
  const fileRef = useRef<HTMLInputElement | null>(null);
  const scrollRef = useRef<HTMLDivElement | null>(null);

  const push = useCallback((sender: Sender, body: string, streaming = false) => {
    const id = nextIdRef.current++;
    setLines((prev) => [...prev, { id, sender, text: body, streaming }]);
    return id;
  }, []);

  // 接続
  useEffect(() => {
    sessionIdRef.current = `session-${crypto.randomUUID()}`;
    const ws = new WebSocket(wsUrl(sessionIdRef.current));
    wsRef.current = ws;

    ws.onopen = () => {
      setLines([{ id: 0, sender: 'bot', text: `✅ Connection established. I am ${model}. Ask me anything!` }]);
      setConnected(true);
    };

    ws.onmessage = (ev: MessageEvent<string>) => {
      const chunk = String(ev.data);
      const current = streamingIdRef.current;
      if (current === null) {
        streamingIdRef.current = push('bot', `🤖 ${chunk}`, true);
        return;
      }
      setLines((prev) => prev.map((l) => (l.id === current ? { ...l, text: l.text + chunk } : l)));
    };

    ws.onclose = () => {
      setLines((prev) => prev.map((l) => (l.streaming ? { ...l, streaming: false } : l)));
      push('bot', '🚫 Connection closed by the server or client.');
      setConnected(false);
    };

    ws.onerror = () => {
      push('bot', '🚨 An error occurred with the WebSocket.');
      setConnected(false);
    };

    return () => ws.close();
  }, [model, push]);

  useEffect(() => {
    const el = scrollRef.current;
    if (el) el.scrollTop = el.scrollHeight;
  }, [lines]);

  const uploadFile = useCallback(async (file: File) => {
    setUploadStatus(`Uploading ${file.name}...`);

    const form = new FormData();
    form.append('file', file);
    form.append('session_id', sessionIdRef.current);

    try {
      const res = await fetch('/api/upload', { method: 'POST', body: form });
      if (!res.ok) throw new Error(`HTTP error! status: ${res.status}`);
      const data: UploadResult = await res.json();
      setUploaded(data);
      setUploadStatus(`✅ File ${file.name} uploaded. Type your prompt to analyze it.`);
    } catch (e) {
      console.error('[RelayChat] upload failed:', e);
      setUploadStatus(`❌ File upload failed: ${e instanceof Error ? e.message : String(e)}`);
      setUploaded(null);
    } finally {
      if (fileRef.current) fileRef.current.value = '';
    }
  }, []);

  const onSubmit = (e: React.FormEvent<HTMLFormElement>) => {
    e.preventDefault();
    const ws = wsRef.current;
    const userText = text.trim();
    if (!ws || (!userText && !uploaded)) return;

    let display = userText;
    if (uploaded) {
      const label = uploaded.category === 'image' ? 'Image' : 'PDF';
      display = `[${label} Attached] ${userText || 'Analyze file'}`;
    }
    push('user', `🧑 ${display}`);

    // 前の応答の streaming 表示を閉じる
    setLines((prev) => prev.map((l) => (l.streaming ? { ...l, streaming: false } : l)));
    streamingIdRef.current = null;

    ws.send(
      JSON.stringify({
        text: userText,
        file_info: uploaded,
        session_id: sessionIdRef.current,
      }),
    );
    setText('');
    setUploaded(null);
    setUploadStatus('');
  };

  return (
    <div className="relay-chatBox">
      <h2>Relay Chat ({model})</h2>
      <div className="relay-messages" ref={scrollRef}>
        {lines.map((l) => (
          <div key={l.id} className={l.sender === 'user' ? 'relay-userMsg' : 'relay-botMsg'}>
            {l.text}
            {l.streaming && <span className="relay-cursor" />}
          </div>
        ))}
      </div>

      <div className="relay-inputs">
        <div className="relay-upload">
          <input
            ref={fileRef}
            type="file"
            accept="image/*,application/pdf"
            style={{ display: 'none' }}
            onChange={(e) => {
              const f = e.target.files?.[0];
              if (f) void uploadFile(f);
            }}
          />
          <button type="button" onClick={() => fileRef.current?.click()}>
            Choose &amp; Upload File
          </button>
        </div>
        <div className="relay-uploadStatus">{uploadStatus}</div>
        <form className="relay-form" onSubmit={onSubmit}>
          <input
            type="text"
            value={text}
            onChange={(e) => setText(e.target.value)}
            placeholder="Type your message..."
          />
          <button type="submit" disabled={!connected}>
            Send
          </button>
        </form>
      </div>
    </div>
  );
}
