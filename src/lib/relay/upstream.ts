// src/lib/relay/upstream.ts
import OpenAI from 'openai';
import type {
  ChatCompletionChunk,
  ChatCompletionCreateParamsStreaming,
  ChatCompletionMessageParam,
} from 'openai/resources/chat/index';
import type { ChatMessage } from './types';

/** 会話履歴 → テキスト断片の列。signal で中断できる */
export interface CompletionSource {
  stream(messages: ChatMessage[], signal: AbortSignal): AsyncIterable<string>;
}

/** OpenAI クライアントのうち streaming で使う部分だけ（テストで差し替える） */
export type ChatStreamClient = {
  chat: {
    completions: {
      create(
        body: ChatCompletionCreateParamsStreaming,
        options: { signal: AbortSignal },
      ): PromiseLike<AsyncIterable<ChatCompletionChunk>>;
    };
  };
};

type OpenAICompletionOptions = {
  apiKey: string;
  model: string;
  client?: ChatStreamClient;
};

export class OpenAICompletionSource implements CompletionSource {
  private readonly client: ChatStreamClient;
  private readonly model: string;

  constructor({ apiKey, model, client }: OpenAICompletionOptions) {
    this.client = client ?? new OpenAI({ apiKey });
    this.model = model;
  }

  async *stream(messages: ChatMessage[], signal: AbortSignal): AsyncIterable<string> {
    const params: ChatCompletionMessageParam[] = messages;
    const stream = await this.client.chat.completions.create(
      { model: this.model, messages: params, stream: true },
      { signal },
    );

    for await (const chunk of stream) {
      const content = chunk.choices[0]?.delta?.content;
      if (content) yield content;
    }
  }
}
