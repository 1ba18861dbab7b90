/**
 * Locate JSON inside free-form model text: a fenced code block anywhere in the
 * text, or else the first balanced object or array.
 */

export type ExtractResult =
  | { found: true; json: string }
  | { found: false; reason: string };

const CODE_FENCE = /```(?:json)?[ \t]*\r?\n?([\s\S]*?)```/i;

/** Inner text of the first ``` fence, or the trimmed content when there is none. */
export function stripMarkdownCodeBlock(content: string): string {
  const trimmed = content.trim();
  const fenced = CODE_FENCE.exec(trimmed);
  return fenced ? fenced[1].trim() : trimmed;
}

/** Index just past the object or array opened at `start`; -1 if it never closes. */
function scanBalanced(text: string, start: number): number {
  const closers: string[] = [];
  let inString = false;

  for (let i = start; i < text.length; i++) {
    const c = text[i];
    if (inString) {
      if (c === "\\") {
        i++;
      } else if (c === '"') {
        inString = false;
      }
      continue;
    }

    if (c === '"') {
      inString = true;
    } else if (c === "{") {
      closers.push("}");
    } else if (c === "[") {
      closers.push("]");
    } else if (c === "}" || c === "]") {
      if (closers.pop() !== c) {
        return -1;
      }
      if (closers.length === 0) {
        return i + 1;
      }
    }
  }
  return -1;
}

export function extractJson(
  content: string,
  stripMarkdown: boolean = true
): ExtractResult {
  const text = stripMarkdown ? stripMarkdownCodeBlock(content) : content.trim();
  if (!text) {
    return { found: false, reason: "Empty content after strip" };
  }

  const start = text.search(/[[{]/);
  if (start < 0) {
    return { found: false, reason: "No JSON object or array found in content" };
  }
  const end = scanBalanced(text, start);
  if (end < 0) {
    return { found: false, reason: "Unclosed JSON bracket" };
  }
  return { found: true, json: text.slice(start, end) };
}
