/**
 * Language model client used for email personalization.
 */

import { Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

export interface LanguageModelClient {
  /** Returns the model's raw text output. */
  generate(request: { model: string; prompt: string }): Promise<string>;
}

export type GeminiClientOptions = {
  apiKey: string;
  timeoutMs: number;
  baseUrl?: string;
  fetchImpl?: typeof fetch;
};

const GEMINI_BASE_URL = "https://generativelanguage.googleapis.com/v1beta";

const GenerateContentResponseSchema = Type.Object({
  candidates: Type.Optional(
    Type.Array(
      Type.Object({
        content: Type.Optional(
          Type.Object({
            parts: Type.Optional(Type.Array(Type.Object({ text: Type.Optional(Type.String()) }))),
          }),
        ),
      }),
    ),
  ),
});

export class GeminiClient implements LanguageModelClient {
  private readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly opts: GeminiClientOptions) {
    this.baseUrl = (opts.baseUrl ?? GEMINI_BASE_URL).replace(/\/+$/, "");
    this.fetchImpl = opts.fetchImpl ?? fetch;
  }

  async generate(request: { model: string; prompt: string }): Promise<string> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.opts.timeoutMs);

    try {
      const res = await this.fetchImpl(
        `${this.baseUrl}/models/${encodeURIComponent(request.model)}:generateContent`,
        {
          method: "POST",
          headers: {
            "Content-Type": "application/json",
            "x-goog-api-key": this.opts.apiKey,
          },
          body: JSON.stringify({ contents: [{ parts: [{ text: request.prompt }] }] }),
          signal: controller.signal,
        },
      );

      if (!res.ok) {
        const errorText = await res.text().catch(() => "Unknown error");
        throw new Error(`Gemini API error (${res.status}): ${errorText}`);
      }

      const body: unknown = await res.json();
      if (!Value.Check(GenerateContentResponseSchema, body)) {
        throw new Error("Gemini API returned an unexpected response shape");
      }
      const text = (body.candidates?.[0]?.content?.parts ?? [])
        .map((part) => part.text ?? "")
        .join("")
        .trim();
      if (!text) {
        throw new Error("Gemini API returned no text");
      }
      return text;
    } finally {
      clearTimeout(timeout);
    }
  }
}
