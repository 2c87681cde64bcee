export function stripHtml(html: string): string {
  return html
    .replace(/<[^>]*>/g, " ")
    .replace(/&amp;/g, "&")
    .replace(/&lt;/g, "<")
    .replace(/&gt;/g, ">")
    .replace(/&quot;/g, '"')
    .replace(/&#39;/g, "'")
    .replace(/&nbsp;/g, " ")
    .replace(/\s+/g, " ")
    .trim();
}

const MAX_JD_LENGTH = 8000;

export function truncateDescription(text: string): string {
  if (text.length <= MAX_JD_LENGTH) return text;
  return text.substring(0, MAX_JD_LENGTH) + "\n\n[...truncated for length]";
}

/**
 * Pulls the JSON payload out of a model reply. Reasoning blocks and
 * markdown fences are removed; if prose surrounds the object, the
 * outermost braces are used. Returns undefined when nothing parses.
 */
export function extractJson(raw: string): unknown {
  let jsonStr = raw.trim();

  // Some models emit their reasoning before the answer
  jsonStr = jsonStr.replace(/<think>[\s\S]*?<\/think>/gi, "").trim();

  const fenced = jsonStr.match(/```(?:json)?\s*\n?([\s\S]*?)\n?\s*```/);
  if (fenced) {
    jsonStr = fenced[1].trim();
  }

  try {
    return JSON.parse(jsonStr);
  } catch {
    const start = jsonStr.indexOf("{");
    const end = jsonStr.lastIndexOf("}");
    if (start === -1 || end <= start) return undefined;
    try {
      return JSON.parse(jsonStr.slice(start, end + 1));
    } catch {
      return undefined;
    }
  }
}
