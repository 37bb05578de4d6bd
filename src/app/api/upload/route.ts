// src/app/api/upload/route.ts
export const runtime = 'nodejs';
export const dynamic = 'force-dynamic';

import { loadRelayLimits } from '@/lib/relay/config';
import { getSessionStore } from '@/lib/relay/sessionStore';
import { createUploadHandler } from '@/lib/relay/uploadHandler';

export const POST = createUploadHandler(getSessionStore(), {
  maxUploadBytes: loadRelayLimits().maxUploadBytes,
});
