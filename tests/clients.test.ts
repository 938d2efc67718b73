import { afterEach, expect, test, vi } from "vitest";
import { buildOllamaHeaders, OllamaClient } from "../src/ollama-client.ts";

afterEach(() => {
  vi.unstubAllGlobals();
});

test("buildOllamaHeaders sends and accepts JSON", () => {
  expect(buildOllamaHeaders()).toEqual({ "Content-Type": "application/json", Accept: "application/json" });
});

test("chat posts a non-streaming request and returns the message content", async () => {
  const fetchMock = vi.fn(async () => new Response(JSON.stringify({ message: { role: "assistant", content: "{}" } })));
  vi.stubGlobal("fetch", fetchMock);

  const client = new OllamaClient("http://ollama.test/");
  const reply = await client.chat({
    model: "gpt-oss",
    messages: [{ role: "user", content: "plan this" }],
    temperature: 0.1,
    maxTokens: 1000,
  });

  expect(reply).toBe("{}");
  expect(fetchMock).toHaveBeenCalledTimes(1);
  expect(fetchMock).toHaveBeenCalledWith(
    "http://ollama.test/api/chat",
    expect.objectContaining({
      method: "POST",
      body: JSON.stringify({
        model: "gpt-oss",
        messages: [{ role: "user", content: "plan this" }],
        stream: false,
        options: { temperature: 0.1, num_predict: 1000 },
      }),
    })
  );
});

test("chat surfaces the runtime's error message", async () => {
  vi.stubGlobal(
    "fetch",
    vi.fn(async () => new Response(JSON.stringify({ error: "model 'gpt-oss' not found" }), { status: 404 }))
  );

  await expect(
    new OllamaClient().chat({ model: "gpt-oss", messages: [{ role: "user", content: "hi" }] })
  ).rejects.toThrow("LLM generation failed: model 'gpt-oss' not found");
});

test("chat rejects replies without message content", async () => {
  vi.stubGlobal("fetch", vi.fn(async () => new Response(JSON.stringify({ done: true }))));

  await expect(
    new OllamaClient().chat({ model: "gpt-oss", messages: [{ role: "user", content: "hi" }] })
  ).rejects.toThrow("LLM generation failed: response has no message content");
});

test("ping reports an unreachable runtime as false", async () => {
  vi.stubGlobal(
    "fetch",
    vi.fn(async () => {
      throw new Error("connect ECONNREFUSED");
    })
  );

  expect(await new OllamaClient().ping()).toBe(false);
});
