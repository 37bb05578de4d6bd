// src/server/relaySocket.ts
// HTTP サーバの upgrade を受けて /ws を relay ループにつなぐ
import type { IncomingMessage, Server } from 'http';
import type { Duplex } from 'stream';
import { WebSocketServer, WebSocket, type RawData } from 'ws';

import { QueuedChannel } from '@/lib/relay/channel';
import { runRelay } from '@/lib/relay/relayLoop';
import { normalizeSessionId } from '@/lib/relay/sessionId';
import type { SessionStore } from '@/lib/relay/sessionStore';
import type { CompletionSource } from '@/lib/relay/upstream';

export const RELAY_PATH = '/ws';

export type RelaySocketDeps = {
  store: SessionStore;
  upstream: CompletionSource;
  systemPrompt: string;
  maxHistoryMessages: number;
};

const rawToText = (data: RawData): string => {
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString('utf8');
  return data.toString('utf8');
};

export function handleRelayConnection(ws: WebSocket, req: IncomingMessage, deps: RelaySocketDeps) {
  const url = new URL(req.url ?? '/', 'http://localhost');
  const sessionId = normalizeSessionId(url.searchParams.get('session_id'));
  if (!sessionId) {
    ws.close(1008, 'Missing session_id in query parameters.');
    return;
  }

  console.log(`[ws] 🔌 connected: ${sessionId}`);
  const channel = new QueuedChannel({
    send: (text, cb) => {
      if (ws.readyState !== WebSocket.OPEN) return cb(new Error('socket not open'));
      ws.send(text, cb);
    },
    close: (code, reason) => ws.close(code, reason),
  });

  ws.on('message', (data) => channel.deliver(rawToText(data)));
  ws.on('close', () => channel.end());
  ws.on('error', (err) => {
    console.warn(`[ws] ⚠ socket error (${sessionId}):`, err.message);
    channel.end();
  });

  runRelay({
    sessionId,
    channel,
    store: deps.store,
    upstream: deps.upstream,
    systemPrompt: deps.systemPrompt,
    maxHistoryMessages: deps.maxHistoryMessages,
  })
    .then(({ turns }) => console.log(`[ws] closed: ${sessionId} (turns=${turns})`))
    .catch((e: unknown) => {
      console.error(`[ws] ❌ relay crashed (${sessionId}):`, e);
      ws.terminate();
    });
}

export function attachRelaySocket(server: Server, deps: RelaySocketDeps): WebSocketServer {
  const wss = new WebSocketServer({ noServer: true });
  wss.on('connection', (ws, req) => handleRelayConnection(ws, req, deps));

  server.on('upgrade', (req: IncomingMessage, socket: Duplex, head: Buffer) => {
    const { pathname } = new URL(req.url ?? '/', 'http://localhost');
    // /ws 以外（Next.js dev の HMR など）は Next 自身の upgrade listener に任せる
    if (pathname !== RELAY_PATH) return;
    wss.handleUpgrade(req, socket, head, (ws) => wss.emit('connection', ws, req));
  });

  return wss;
}
