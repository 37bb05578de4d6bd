// src/lib/relay/conversation.ts
import type { AssistantMessage, ChatMessage, SystemMessage, UserMessage } from './types';

/**
 * 1 接続ぶんの会話履歴。先頭は常に system。
 * maxMessages を超えたら system 以外の古いものから落とす。
 */
export class Conversation {
  private readonly system: SystemMessage;
  private readonly turns: Array<UserMessage | AssistantMessage> = [];

  constructor(
    systemPrompt: string,
    private readonly maxMessages: number = Number.POSITIVE_INFINITY,
  ) {
    this.system = { role: 'system', content: systemPrompt };
  }

  append(message: UserMessage | AssistantMessage): void {
    this.turns.push(message);
    const overflow = this.turns.length - this.maxMessages;
    if (overflow > 0) this.turns.splice(0, overflow);
  }

  /** upstream に渡す用のコピー（以降の append の影響を受けない） */
  snapshot(): ChatMessage[] {
    return [this.system, ...this.turns];
  }

  get length(): number {
    return this.turns.length + 1;
  }
}
