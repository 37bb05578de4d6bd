// src/tests/relayLoop.spec.ts
import { describe, it, expect } from "vitest";
import { ChannelClosedError, type ClientChannel } from "../lib/relay/channel";
import { Conversation } from "../lib/relay/conversation";
import { runRelay, type RelayState } from "../lib/relay/relayLoop";
import { SessionStore } from "../lib/relay/sessionStore";
import type { CompletionSource } from "../lib/relay/upstream";
import type { ChatMessage } from "../lib/relay/types";

/** 決められた順にメッセージを返し、尽きたら切断されるチャネル */
class ScriptedChannel implements ClientChannel {
  readonly sent: string[] = [];
  closedWith: { code?: number; reason?: string } | null = null;
  private readonly controller = new AbortController();

  constructor(
    private readonly script: string[],
    private readonly maxSends = Number.POSITIVE_INFINITY,
  ) {}

  get closed() {
    return this.controller.signal.aborted;
  }

  get signal() {
    return this.controller.signal;
  }

  async receive() {
    const next = this.script.shift();
    if (next === undefined) {
      this.controller.abort();
      return null;
    }
    return next;
  }

  async send(text: string) {
    if (this.closed || this.sent.length >= this.maxSends) {
      this.controller.abort();
      throw new ChannelClosedError();
    }
    this.sent.push(text);
  }

  close(code?: number, reason?: string) {
    this.closedWith = { code, reason };
    this.controller.abort();
  }
}

class FakeUpstream implements CompletionSource {
  readonly calls: ChatMessage[][] = [];

  constructor(
    private readonly replies: string[][],
    private readonly failWith: Error | null = null,
  ) {}

  async *stream(messages: ChatMessage[]) {
    this.calls.push(messages);
    if (this.failWith) throw this.failWith;
    for (const fragment of this.replies.shift() ?? []) yield fragment;
  }
}

const SYSTEM = "system directive";
const msg = (text: string) => JSON.stringify({ text, file_info: null, session_id: "s1" });

const setup = (script: string[], replies: string[][], opts: { maxSends?: number; failWith?: Error } = {}) => {
  const channel = new ScriptedChannel(script, opts.maxSends);
  const upstream = new FakeUpstream(replies, opts.failWith ?? null);
  const store = new SessionStore();
  const conversation = new Conversation(SYSTEM);
  const states: RelayState[] = [];
  const run = () =>
    runRelay({
      sessionId: "s1",
      channel,
      store,
      upstream,
      systemPrompt: SYSTEM,
      conversation,
      onStateChange: (s) => states.push(s),
    });
  return { channel, upstream, store, conversation, states, run };
};

describe("runRelay", () => {
  it("sends a text-only turn as a single text part", async () => {
    const t = setup([msg("hello")], [["Hel", "lo!"]]);
    const result = await t.run();

    expect(result).toEqual({ turns: 1, error: null });
    expect(t.upstream.calls).toHaveLength(1);
    expect(t.upstream.calls[0]).toEqual([
      { role: "system", content: SYSTEM },
      { role: "user", content: [{ type: "text", text: "hello" }] },
    ]);
  });

  it("relays fragments in order without dropping or duplicating", async () => {
    const fragments = ["The ", "glucose ", "level ", "is ", "normal."];
    const t = setup([msg("q")], [fragments]);
    await t.run();

    expect(t.channel.sent).toEqual(fragments);
    expect(t.channel.sent.join("")).toBe("The glucose level is normal.");
  });

  it("grows the conversation by exactly two per completed turn", async () => {
    const t = setup([msg("first"), msg("second")], [["one"], ["two"]]);
    await t.run();

    expect(t.conversation.length).toBe(5);
    expect(t.conversation.snapshot()[2]).toEqual({ role: "assistant", content: "one" });
    expect(t.conversation.snapshot()[4]).toEqual({ role: "assistant", content: "two" });
    // 2 ターン目は 1 ターン目の履歴ごと送られる
    expect(t.upstream.calls[1]).toHaveLength(4);
  });

  it("skips a turn with no text and no pending file", async () => {
    const t = setup([msg("")], []);
    const result = await t.run();

    expect(result.turns).toBe(0);
    expect(t.upstream.calls).toHaveLength(0);
    expect(t.conversation.length).toBe(1);
    expect(t.channel.sent).toEqual([]);
  });

  it("attaches a pending image and consumes it", async () => {
    const t = setup([msg("")], [["ok"]]);
    t.store.put("s1", { kind: "image", mime: "image/png", dataUrl: "data:image/png;base64,AAAA" });
    await t.run();

    expect(t.upstream.calls[0][1]).toEqual({
      role: "user",
      content: [
        { type: "text", text: "Analyze this image and respond to my prompt." },
        { type: "image_url", image_url: { url: "data:image/png;base64,AAAA" } },
      ],
    });
    expect(t.store.take("s1")).toBeNull();
  });

  it("prepends pending pdf text to the prompt", async () => {
    const t = setup([msg("summarize")], [["ok"]]);
    t.store.put("s1", { kind: "pdf", text: "PDF BODY" });
    await t.run();

    expect(t.upstream.calls[0][1]).toEqual({
      role: "user",
      content: [{ type: "text", text: "PDF BODY\n\nUser prompt: summarize" }],
    });
  });

  it("treats a non-json frame as plain text and leaves the pending file alone", async () => {
    const t = setup(["plain words"], [["ok"]]);
    t.store.put("s1", { kind: "pdf", text: "PDF BODY" });
    await t.run();

    expect(t.upstream.calls[0][1]).toEqual({
      role: "user",
      content: [{ type: "text", text: "plain words" }],
    });
    expect(t.store.size).toBe(1);
  });

  it("does not commit an empty response", async () => {
    const t = setup([msg("hello")], [[]]);
    const result = await t.run();

    expect(result.turns).toBe(1);
    expect(t.conversation.length).toBe(2);
    expect(t.conversation.snapshot()[1].role).toBe("user");
  });

  it("reports an upstream failure once and closes the connection", async () => {
    const t = setup([msg("hello"), msg("never processed")], [], { failWith: new Error("upstream down") });
    const result = await t.run();

    expect(result.error?.message).toBe("upstream down");
    expect(t.channel.sent).toEqual(["ERROR: upstream down"]);
    expect(t.channel.closedWith).toEqual({ code: 1011, reason: "relay error" });
    expect(t.upstream.calls).toHaveLength(1);
  });

  it("ends silently when the client disconnects mid-stream", async () => {
    const t = setup([msg("hello")], [["a", "b", "c"]], { maxSends: 1 });
    const result = await t.run();

    expect(result).toEqual({ turns: 0, error: null });
    expect(t.channel.sent).toEqual(["a"]);
    expect(t.channel.closedWith).toBeNull();
    expect(t.conversation.length).toBe(2);
  });

  it("aborts the upstream stream when the client disconnects mid-stream", async () => {
    const seen: { abortedAtExit: boolean | null; yielded: number } = { abortedAtExit: null, yielded: 0 };
    const upstream: CompletionSource = {
      async *stream(_messages, signal) {
        try {
          for (const f of ["a", "b", "c", "d"]) {
            seen.yielded++;
            yield f;
          }
        } finally {
          seen.abortedAtExit = signal.aborted;
        }
      },
    };
    const channel = new ScriptedChannel([msg("hello")], 1);

    const result = await runRelay({
      sessionId: "s1",
      channel,
      store: new SessionStore(),
      upstream,
      systemPrompt: SYSTEM,
    });

    expect(result.error).toBeNull();
    expect(channel.sent).toEqual(["a"]);
    expect(seen.abortedAtExit).toBe(true);
    expect(seen.yielded).toBe(2);
  });

  it("walks through the relay states", async () => {
    const t = setup([msg("hello")], [["hi"]]);
    await t.run();

    expect(t.states).toEqual([
      "AWAITING_MESSAGE",
      "BUILDING_PROMPT",
      "STREAMING_RESPONSE",
      "AWAITING_MESSAGE",
      "CLOSED",
    ]);
  });
});
