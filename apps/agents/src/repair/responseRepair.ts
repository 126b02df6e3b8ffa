import { z } from "zod";
import { ResponseUnparsableError } from "../pipeline/errors";

export type RepairStrategy = "direct" | "unfenced" | "braced" | "repaired";

export type RepairOutcome<T> =
  | { ok: true; value: T; strategy: RepairStrategy }
  | { ok: false; value: T; error: ResponseUnparsableError };

type Candidate = { strategy: RepairStrategy; text: () => string | undefined };

function stripCodeFences(text: string) {
  return text
    .trim()
    .replace(/^```[\w-]*[ \t]*\r?\n?/, "")
    .replace(/\r?\n?[ \t]*```$/, "")
    .trim();
}

function bracedSlice(text: string) {
  const start = text.indexOf("{");
  const end = text.lastIndexOf("}");
  return start !== -1 && end > start ? text.slice(start, end + 1) : undefined;
}

// Index just past the closing quote, or text.length when the string never closes.
function scanQuoted(text: string, start: number, quote: string) {
  let index = start + 1;
  while (index < text.length) {
    const char = text[index];
    if (char === "\\") {
      index += 2;
      continue;
    }
    if (char === quote) {
      return index + 1;
    }
    index += 1;
  }
  return text.length;
}

/**
 * Drops trailing commas before `}` / `]` and rewrites single-quoted strings as
 * JSON strings. Content of double-quoted strings is left alone.
 */
export function lightJsonRepair(text: string) {
  let output = "";
  let index = 0;

  while (index < text.length) {
    const char = text[index];

    if (char === "\"") {
      const end = scanQuoted(text, index, "\"");
      output += text.slice(index, end);
      index = end;
      continue;
    }

    if (char === "'") {
      const end = scanQuoted(text, index, "'");
      const closed = end <= text.length && text[end - 1] === "'" && end - 1 > index;
      const inner = text.slice(index + 1, closed ? end - 1 : end);
      output += JSON.stringify(inner.replace(/\\'/g, "'"));
      index = end;
      continue;
    }

    if (char === ",") {
      let next = index + 1;
      while (next < text.length && /\s/.test(text[next])) {
        next += 1;
      }
      if (text[next] === "}" || text[next] === "]") {
        index += 1;
        continue;
      }
    }

    output += char;
    index += 1;
  }

  return output;
}

function summarizeZodIssues(error: z.ZodError) {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join(".") : "<root>";
    return `${path}: ${issue.message}`;
  });
}

function candidatesFor(raw: string): Candidate[] {
  return [
    { strategy: "direct", text: () => raw },
    { strategy: "unfenced", text: () => stripCodeFences(raw) },
    { strategy: "braced", text: () => bracedSlice(raw) },
    {
      strategy: "repaired",
      text: () => {
        const slice = bracedSlice(raw);
        return slice === undefined ? undefined : lightJsonRepair(slice);
      },
    },
  ];
}

/**
 * Extracts a record from free-form model output. Strategies run in order and
 * the first candidate that parses AND validates wins. Never throws: when every
 * strategy fails the caller's default is returned with a ResponseUnparsableError.
 */
export function repairResponse<T>(
  raw: string,
  schema: z.ZodType<T>,
  fallback: () => T
): RepairOutcome<T> {
  let issues: string[] = [];
  let lastText: string | undefined;

  for (const candidate of candidatesFor(raw)) {
    const text = candidate.text();
    if (text === undefined || text === lastText) {
      continue;
    }
    lastText = text;

    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch {
      issues = ["The response was not valid JSON."];
      continue;
    }

    const result = schema.safeParse(parsed);
    if (result.success) {
      return { ok: true, value: result.data, strategy: candidate.strategy };
    }
    issues = summarizeZodIssues(result.error);
  }

  return {
    ok: false,
    value: fallback(),
    error: new ResponseUnparsableError(
      `Could not extract a valid record from model output: ${issues.join("; ")}`,
      issues
    ),
  };
}
