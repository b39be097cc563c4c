/**
 * ContractExtractor – OpenAI-compatible chat-completions provider
 *
 * Configuration:
 *   new OpenAIProvider({ apiKey: process.env.OPENAI_API_KEY ?? "" })
 *
 * One completion call per attempt. The model is asked for a JSON object
 * keyed by the requested field names plus `_evidence` and `_confidence`
 * side maps; see `parseFillResponse` for how replies are read.
 */

import { z } from "zod";
import type {
  AIFailureKind,
  AIFillRequest,
  AIFillResult,
  AIProvider,
} from "./AIProvider";
import { AIProviderError } from "./AIProvider";
import { parseFillResponse } from "./response";

// ─── Config ──────────────────────────────────────────────────────────────────

export interface OpenAIProviderConfig {
  apiKey: string;
  model?: string;
  baseUrl?: string;
  timeoutMs?: number;
  temperature?: number;
  /** Send `response_format: json_object` (not every compatible API takes it) */
  jsonMode?: boolean;
  /** Registry name */
  name?: string;
}

// ─── Prompts ─────────────────────────────────────────────────────────────────

const SYSTEM_PROMPT =
  "أنت مساعد دقيق للغاية لاستخراج الحقول بشكل منظم بصيغة JSON فقط. " +
  "You extract fields from Saudi employment contracts and answer with JSON only.";

const OUTPUT_RULES = [
  "- Return JSON only, no prose.",
  "- Keys must be EXACTLY the field keys listed above.",
  '- A field not present in the text gets "".',
  "- Dates as DD/MM/YYYY only.",
  "- Money and count fields: digits only, no separators, symbols or currency.",
  "- Mobile numbers without spaces; 9660… becomes 966….",
  "- Contract duration: a number only (1 for a year, 6 for six months).",
  '- Add "_evidence": { field: short quote from the text proving the value }.',
  '- Add "_confidence": { field: number from 0 to 1 }.',
];

const ChatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullish() }).optional(),
      }),
    )
    .default([]),
});

// ─── Implementation ──────────────────────────────────────────────────────────

export class OpenAIProvider implements AIProvider {
  readonly name: string;
  protected readonly config: Required<Omit<OpenAIProviderConfig, "name">>;

  constructor(config: OpenAIProviderConfig) {
    this.name = config.name ?? "openai";
    this.config = {
      apiKey: config.apiKey,
      model: config.model ?? "gpt-4o-mini",
      baseUrl: (config.baseUrl ?? "https://api.openai.com/v1").replace(
        /\/+$/,
        "",
      ),
      timeoutMs: config.timeoutMs ?? 60_000,
      temperature: config.temperature ?? 0,
      jsonMode: config.jsonMode ?? true,
    };
  }

  async isAvailable(): Promise<boolean> {
    return this.config.apiKey.trim().length > 0;
  }

  async fill(request: AIFillRequest): Promise<AIFillResult> {
    const content = await this.callAPI(this.buildPrompt(request));
    return parseFillResponse(
      content,
      request.fields.map((f) => f.key),
      this.name,
    );
  }

  // ─── Private helpers ──────────────────────────────────────────────────────

  buildPrompt(req: AIFillRequest): string {
    return [
      "Fill ONLY the following missing fields of an employment contract:",
      ...req.fields.map((f) => `- ${f.key} (${f.header})`),
      "",
      "Output rules:",
      ...OUTPUT_RULES,
      "",
      "=== CONTRACT TEXT ===",
      req.text,
    ].join("\n");
  }

  /**
   * One completion call. The timer covers the whole exchange, body read
   * included; an abort at any point is reported as a timeout.
   */
  private async callAPI(userPrompt: string): Promise<string> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.config.timeoutMs);
    const fail = (
      err: unknown,
      message: string,
      kind: AIFailureKind,
    ): AIProviderError =>
      controller.signal.aborted
        ? new AIProviderError(
            `Request timed out after ${this.config.timeoutMs}ms`,
            this.name,
            "timeout",
            err,
          )
        : new AIProviderError(message, this.name, kind, err);

    try {
      let response: Response;
      try {
        response = await fetch(`${this.config.baseUrl}/chat/completions`, {
          method: "POST",
          headers: {
            "Content-Type": "application/json",
            Authorization: `Bearer ${this.config.apiKey}`,
          },
          body: JSON.stringify({
            model: this.config.model,
            messages: [
              { role: "system", content: SYSTEM_PROMPT },
              { role: "user", content: userPrompt },
            ],
            temperature: this.config.temperature,
            ...(this.config.jsonMode
              ? { response_format: { type: "json_object" } }
              : {}),
          }),
          signal: controller.signal,
        });
      } catch (err) {
        throw fail(
          err,
          `API call failed: ${err instanceof Error ? err.message : String(err)}`,
          "transport",
        );
      }

      if (!response.ok) {
        const detail = await response.text().catch((err: unknown) => {
          if (controller.signal.aborted) throw fail(err, "", "timeout");
          return "";
        });
        throw new AIProviderError(
          `HTTP ${response.status}: ${detail}`,
          this.name,
          "transport",
        );
      }

      let body: unknown;
      try {
        body = await response.json();
      } catch (err) {
        throw fail(err, "Response body is not JSON", "malformed");
      }

      const data = ChatCompletionSchema.safeParse(body);
      if (!data.success) {
        throw new AIProviderError(
          "Unexpected chat-completions payload",
          this.name,
          "malformed",
          data.error,
        );
      }
      return data.data.choices[0]?.message?.content ?? "";
    } finally {
      clearTimeout(timer);
    }
  }
}
