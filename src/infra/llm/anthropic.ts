import Anthropic from "@anthropic-ai/sdk";
import { getConfig } from "../../config";
import { SuggestionUnavailableError } from "../../errors";

let anthropicClient: Anthropic | null = null;

/** Singleton Anthropic client; fails fast when no key is configured. */
export function getAnthropicClient(): Anthropic {
  const apiKey = getConfig().ANTHROPIC_API_KEY;
  if (!apiKey) {
    throw new SuggestionUnavailableError("ANTHROPIC_API_KEY is not set in the environment.");
  }
  if (!anthropicClient) {
    anthropicClient = new Anthropic({ apiKey });
  }
  return anthropicClient;
}

export async function createAnthropicCompletion(opts: {
  system: string;
  user: string;
  model?: string;
  temperature?: number;
  maxTokens?: number;
}): Promise<string> {
  const client = getAnthropicClient();
  const config = getConfig();
  const completion = await client.messages.create({
    model: opts.model ?? config.CLAUDE_MODEL,
    max_tokens: opts.maxTokens ?? config.DETECTIVE_SUGGEST_MAX_TOKENS,
    temperature: opts.temperature ?? 0,
    system: opts.system,
    messages: [{ role: "user", content: opts.user }],
  });

  return completion.content.map((block) => (block.type === "text" ? block.text : "")).join("\n");
}
