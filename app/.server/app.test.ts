import type { Server } from "node:http";
import { afterAll, beforeAll, beforeEach, describe, expect, it, vi } from "vitest";
import { createApp } from "~/.server/app";
import { callGroqCompletion, type GroqCompletionOptions } from "~/.server/vendors/groq";

vi.mock("~/.server/vendors/groq", () => ({
  callGroqCompletion: vi.fn(),
  isGroqConfigured: vi.fn(() => true),
}));

const completion = vi.mocked(callGroqCompletion);

let server: Server;
let baseUrl: string;

beforeAll(async () => {
  server = createApp().listen(0, "127.0.0.1");
  await new Promise<void>((resolve) => server.once("listening", () => resolve()));
  const address = server.address();
  if (!address || typeof address === "string") {
    throw new Error("test server has no port");
  }
  baseUrl = `http://127.0.0.1:${address.port}`;
});

afterAll(async () => {
  await new Promise<void>((resolve, reject) => server.close((error) => (error ? reject(error) : resolve())));
});

beforeEach(() => {
  completion.mockReset();
});

function reply(content: string) {
  completion.mockResolvedValue({ content, finishReason: "stop" });
}

function post(path: string, body: unknown) {
  return fetch(`${baseUrl}${path}`, {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: typeof body === "string" ? body : JSON.stringify(body),
  });
}

describe("info routes", () => {
  it("GET / lists the analysis endpoints", async () => {
    const res = await fetch(`${baseUrl}/`);

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      message: "MoodDecode NLP API is running!",
      endpoints: {
        mood_analysis: "/analyze_mood",
        crisis_detection: "/detect_crisis",
        text_summarization: "/summarize",
      },
      status: "healthy",
    });
  });

  it("GET /health reports healthy", async () => {
    const res = await fetch(`${baseUrl}/health`);

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ status: "healthy", api: "MoodDecode NLP API" });
  });

  it("unknown routes return 404", async () => {
    const res = await fetch(`${baseUrl}/analyze_mood`);

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: "Not found" });
  });
});

describe("POST /analyze_mood", () => {
  it("returns the mood record", async () => {
    reply('{"emotion": "sad", "confidence": 0.81}');

    const res = await post("/analyze_mood", { text: "I miss my old friends" });

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ emotion: "sad", confidence: 0.81 });
  });

  it("returns 500 when the provider reply is not JSON", async () => {
    reply("Sorry, I cannot help with that.");

    const res = await post("/analyze_mood", { text: "hello" });

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({
      error: "Error analyzing mood: Unable to parse JSON from LLM response",
    });
  });
});

describe("POST /detect_crisis", () => {
  it("returns the crisis record", async () => {
    reply('{"crisis_detected": true, "severity": "high", "confidence": 0.9}');

    const res = await post("/detect_crisis", { text: "I feel like a burden to everyone" });

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ crisis_detected: true, severity: "high", confidence: 0.9 });
  });

  it("returns 500 when a field is missing", async () => {
    reply('{"crisis_detected": false, "confidence": 0.5}');

    const res = await post("/detect_crisis", { text: "just tired" });

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({
      error: 'Error detecting crisis: missing or invalid field "severity"',
    });
  });
});

describe("POST /summarize", () => {
  it("returns the summary record", async () => {
    reply('{"summary": "A short summary."}');

    const res = await post("/summarize", { text: "A much longer piece of text that needs summarizing." });

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ summary: "A short summary." });
  });

  it("returns 500 when the completion call fails", async () => {
    completion.mockRejectedValue(new Error("API call failed: Request timed out."));

    const res = await post("/summarize", { text: "anything" });

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({
      error: "Error summarizing text: API call failed: Request timed out.",
    });
  });

  it("accepts empty text and forwards it", async () => {
    reply('{"summary": ""}');

    const res = await post("/summarize", { text: "" });

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ summary: "" });
    expect(completion).toHaveBeenCalledTimes(1);
    expect(completion.mock.calls[0]?.[0].prompt).toContain('Text to summarize: ""');
  });
});

describe("request validation", () => {
  it("rejects a body without text", async () => {
    const res = await post("/analyze_mood", { message: "hi" });

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({
      error: "Invalid request data",
      details: [{ path: ["text"] }],
    });
    expect(completion).not.toHaveBeenCalled();
  });

  it("rejects text that is not a string", async () => {
    const res = await post("/detect_crisis", { text: 42 });

    expect(res.status).toBe(400);
    expect(completion).not.toHaveBeenCalled();
  });

  it("rejects a body that is not valid JSON", async () => {
    const res = await post("/summarize", '{"text": ');

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "Invalid JSON body" });
  });

  it("rejects an unsupported charset with 415", async () => {
    const res = await fetch(`${baseUrl}/analyze_mood`, {
      method: "POST",
      headers: { "Content-Type": "application/json; charset=iso-8859-1" },
      body: JSON.stringify({ text: "hello" }),
    });

    expect(res.status).toBe(415);
    expect(await res.json()).toEqual({ error: 'unsupported charset "ISO-8859-1"' });
    expect(completion).not.toHaveBeenCalled();
  });

  it("rejects an unsupported content encoding with 415", async () => {
    const res = await fetch(`${baseUrl}/summarize`, {
      method: "POST",
      headers: { "Content-Type": "application/json", "Content-Encoding": "x-custom" },
      body: JSON.stringify({ text: "hello" }),
    });

    expect(res.status).toBe(415);
    expect(await res.json()).toEqual({ error: 'unsupported content encoding "x-custom"' });
  });

  it("rejects a body over the size limit with 413", async () => {
    const res = await post("/summarize", { text: "x".repeat(1_100_000) });

    expect(res.status).toBe(413);
    expect(await res.json()).toEqual({ error: "Request body too large" });
  });
});

describe("concurrent requests", () => {
  it("answers each request from its own completion call", async () => {
    completion.mockImplementation(async (options: GroqCompletionOptions) => {
      const delay = options.prompt.includes('"first"') ? 30 : 0;
      await new Promise((resolve) => setTimeout(resolve, delay));
      return {
        content: options.prompt.includes('"first"')
          ? '{"summary": "one"}'
          : '{"summary": "two"}',
        finishReason: "stop",
      };
    });

    const [first, second] = await Promise.all([
      post("/summarize", { text: "first" }),
      post("/summarize", { text: "second" }),
    ]);

    expect(await first.json()).toEqual({ summary: "one" });
    expect(await second.json()).toEqual({ summary: "two" });
    expect(completion).toHaveBeenCalledTimes(2);
  });
});
