// src/app/page.tsx
import RelayChat from '@/components/RelayChat/RelayChat';
import { DEFAULT_MODEL } from '@/lib/relay/config';

export const dynamic = 'force-dynamic';

export default function HomePage() {
  const model = process.env.OPENAI_MODEL?.trim() || DEFAULT_MODEL;

  return (
    <main className="relay-main">
      <RelayChat model={model} />
    </main>
  );
}
