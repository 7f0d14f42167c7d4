/**
 * Claude Messages API request helper.
 */

import { z } from "zod";
import { readApiError, timeoutSignal } from "../http.js";

/** Parameters needed to make a Claude Messages API call */
export interface ClaudeApiParams {
  apiKey: string;
  baseUrl: string;
  model: string;
  timeout?: number;
}

const claudeResponseSchema = z.object({
  content: z.array(z.object({ type: z.string(), text: z.string().optional() })),
});

/**
 * Send a request to the Claude Messages API and return the text response.
 * Throws on HTTP errors or missing content.
 */
export async function callClaude(
  params: ClaudeApiParams,
  opts: {
    system: string;
    messages: Array<{ role: "user" | "assistant"; content: string }>;
    maxTokens: number;
    temperature?: number;
  }
): Promise<string> {
  const response = await fetch(`${params.baseUrl}/messages`, {
    method: "POST",
    headers: {
      "Content-Type": "application/json",
      "x-api-key": params.apiKey,
      "anthropic-version": "2023-06-01",
    },
    body: JSON.stringify({
      model: params.model,
      max_tokens: opts.maxTokens,
      ...(opts.temperature !== undefined ? { temperature: opts.temperature } : {}),
      messages: opts.messages,
      system: opts.system,
    }),
    signal: timeoutSignal(params.timeout),
  });

  if (!response.ok) {
    throw new Error(`Claude ${await readApiError(response)}`);
  }

  const data = claudeResponseSchema.parse(await response.json());
  const text = data.content.find((c) => c.type === "text")?.text;
  if (!text) {
    throw new Error("No text content in Claude response");
  }
  return text;
}
