import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import OpenAI from "openai";
import type {
  ChatCompletion,
  ChatCompletionCreateParamsNonStreaming,
} from "openai/resources/chat/completions";
import { ChatCompletionClient, OpenAIProvider } from "./openai-provider";
import { ProviderError, RateLimitError } from "../../utils/errors";

function completion(content: string | null): ChatCompletion {
  return {
    id: "chatcmpl-test",
    object: "chat.completion",
    created: 1704067200,
    model: "gpt-test",
    choices: [
      {
        index: 0,
        finish_reason: "stop",
        logprobs: null,
        message: { role: "assistant", content, refusal: null },
      },
    ],
    usage: { prompt_tokens: 120, completion_tokens: 40, total_tokens: 160 },
  };
}

function fakeClient(create: (body: ChatCompletionCreateParamsNonStreaming) => Promise<ChatCompletion>) {
  const createMock = jest.fn(create);
  const listMock = jest.fn(async (): Promise<unknown> => ({ data: [] }));
  const client: ChatCompletionClient = {
    chat: { completions: { create: createMock } },
    models: { list: listMock },
  };
  return { client, createMock, listMock };
}

describe("OpenAIProvider", () => {
  it("sends system and user messages with the generation config", async () => {
    const { client, createMock } = fakeClient(async () => completion("ETH looks steady."));
    const provider = new OpenAIProvider({ client });

    const text = await provider.generate("system text", "user text", {
      model: "gpt-test",
      temperature: 0.3,
      maxTokens: 400,
    });

    expect(text).toBe("ETH looks steady.");
    expect(createMock).toHaveBeenCalledWith({
      model: "gpt-test",
      messages: [
        { role: "system", content: "system text" },
        { role: "user", content: "user text" },
      ],
      temperature: 0.3,
      max_tokens: 400,
    });
  });

  it("returns an empty string for an empty completion", async () => {
    const { client } = fakeClient(async () => completion(null));
    const provider = new OpenAIProvider({ client });

    await expect(
      provider.generate("s", "u", { model: "gpt-test", temperature: 0.2 })
    ).resolves.toBe("");
  });

  it("translates the SDK rate-limit error", async () => {
    const { client } = fakeClient(async () => {
      throw new OpenAI.RateLimitError(429, undefined, "Too many requests", {});
    });
    const provider = new OpenAIProvider({ client });

    const error = await provider
      .generate("s", "u", { model: "gpt-test", temperature: 0.2 })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RateLimitError);
    expect(error).toHaveProperty("status", 429);
  });

  it("translates other API errors with their status", async () => {
    const { client } = fakeClient(async () => {
      throw new OpenAI.APIError(500, undefined, "Internal server error", {});
    });
    const provider = new OpenAIProvider({ client });

    const error = await provider
      .generate("s", "u", { model: "gpt-test", temperature: 0.2 })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ProviderError);
    expect(error).not.toBeInstanceOf(RateLimitError);
    expect(error).toHaveProperty("status", 500);
  });

  it("rethrows non-API errors unchanged", async () => {
    const failure = new TypeError("socket hang up");
    const { client } = fakeClient(async () => {
      throw failure;
    });
    const provider = new OpenAIProvider({ client });

    await expect(
      provider.generate("s", "u", { model: "gpt-test", temperature: 0.2 })
    ).rejects.toBe(failure);
  });

  it("writes an interaction transcript when enabled", async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "llm-log-"));
    const { client } = fakeClient(async () => completion("transcribed answer"));
    const provider = new OpenAIProvider({
      client,
      logInteractions: true,
      interactionLogDir: dir,
    });

    await provider.generate("the system prompt", "the user prompt", {
      model: "gpt-test",
      temperature: 0.3,
    });

    const files = fs.readdirSync(dir);
    expect(files).toHaveLength(1);
    expect(files[0]).toMatch(/_generation\.md$/);
    const content = fs.readFileSync(path.join(dir, files[0]), "utf-8");
    expect(content).toContain("Model: gpt-test");
    expect(content).toContain("the system prompt");
    expect(content).toContain("the user prompt");
    expect(content).toContain("transcribed answer");

    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("reports connection status from the models endpoint", async () => {
    const ok = fakeClient(async () => completion("x"));
    await expect(new OpenAIProvider({ client: ok.client }).testConnection()).resolves.toBe(true);
    expect(ok.listMock).toHaveBeenCalledTimes(1);

    const failing = fakeClient(async () => completion("x"));
    failing.listMock.mockRejectedValueOnce(new Error("401 Incorrect API key provided"));
    await expect(new OpenAIProvider({ client: failing.client }).testConnection()).resolves.toBe(
      false
    );
  });

  it("requires an API key without an injected client", () => {
    expect(() => new OpenAIProvider({})).toThrow(ProviderError);
  });
});
