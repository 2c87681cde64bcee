import { logger } from "../logger";
import { PermanentOracleError } from "../errors";
import type { AIClient } from "../ai";

/** Turns a plain-text job description into Markdown without rewording it. */
export interface DescriptionFormatter {
  format(description: string): Promise<string>;
}

export const FORMAT_SYSTEM_PROMPT = `You are a Markdown formatter for job descriptions.
Apply Markdown structure only: headings, bold text, bullet points and paragraph breaks.
Do not alter, paraphrase, add or remove any words. Keep every piece of the original text.
Output only the formatted Markdown, with no explanation or commentary.`;

export function buildFormatPrompt(description: string): string {
  return [
    "Convert the job description below into well-structured Markdown.",
    "",
    "--- JOB DESCRIPTION ---",
    description,
    "--- END JOB DESCRIPTION ---",
  ].join("\n");
}

export function stripCodeFence(text: string): string {
  const trimmed = text.trim();
  const match = trimmed.match(/^```(?:markdown|md)?[ \t]*\n([\s\S]*?)\n```$/);
  return (match ? match[1] : trimmed).trim();
}

function words(text: string): string[] {
  return text.toLowerCase().match(/[\p{L}\p{N}]+/gu) ?? [];
}

/** True when both texts carry the same words in the same order, ignoring markup. */
export function preservesWording(original: string, markdown: string): boolean {
  const before = words(original);
  const after = words(markdown);
  return before.length === after.length && before.every((word, i) => word === after[i]);
}

export class AIDescriptionFormatter implements DescriptionFormatter {
  constructor(private readonly client: AIClient) {}

  async format(description: string): Promise<string> {
    const { content } = await this.client.complete(
      FORMAT_SYSTEM_PROMPT,
      buildFormatPrompt(description),
    );
    const markdown = stripCodeFence(content);

    if (!preservesWording(description, markdown)) {
      logger.debug(`AI: Reworded description: ${markdown.substring(0, 500)}`);
      throw new PermanentOracleError("Formatted description does not keep the original wording");
    }
    return markdown;
  }
}
