// server.ts
// Next.js custom server + /ws（WebSocket relay）
import { createServer } from 'http';
import next from 'next';

import { loadRelayConfig } from '@/lib/relay/config';
import { getSessionStore } from '@/lib/relay/sessionStore';
import { OpenAICompletionSource } from '@/lib/relay/upstream';
import { attachRelaySocket } from '@/server/relaySocket';

const dev = process.env.NODE_ENV !== 'production';

async function main() {
  const config = loadRelayConfig();
  const server = createServer((req, res) => {
    handle(req, res).catch((e: unknown) => {
      console.error('[server] ❌ request failed:', req.url, e);
      res.statusCode = 500;
      res.end('Internal Server Error');
    });
  });

  // httpServer を渡すと Next が自分の upgrade listener（dev HMR）を登録する
  const app = next({ dev, hostname: config.hostname, port: config.port, httpServer: server });
  const handle = app.getRequestHandler();
  await app.prepare();

  attachRelaySocket(server, {
    // upload route と同じインスタンス
    store: getSessionStore(),
    upstream: new OpenAICompletionSource({ apiKey: config.openaiApiKey, model: config.model }),
    systemPrompt: config.systemPrompt,
    maxHistoryMessages: config.maxHistoryMessages,
  });

  server.listen(config.port, config.hostname, () => {
    console.log(`[server] ✅ ready on http://${config.hostname}:${config.port} (model=${config.model})`);
  });
}

main().catch((e: unknown) => {
  console.error('[server] ❌ failed to start:', e);
  process.exit(1);
});
