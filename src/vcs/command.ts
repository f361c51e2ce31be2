import { parse as parseShellQuote } from "shell-quote";

export type ParsedOriginalCommand = { ok: true; argv: string[] } | { ok: false; reason: string };

export function parseOriginalCommand(command: string): ParsedOriginalCommand {
  const quoteError = findQuotingError(command);
  if (quoteError) {
    return { ok: false, reason: quoteError };
  }

  const argv: string[] = [];
  const entries = parseShellQuote(escapeExpansions(command));
  for (const entry of entries) {
    if (typeof entry === "string") {
      argv.push(entry);
      continue;
    }

    if ("op" in entry && entry.op === "glob") {
      argv.push(entry.pattern);
      continue;
    }

    return { ok: false, reason: "shell operators are not allowed" };
  }

  return { ok: true, argv };
}

// shell-quote expands `$` and starts a comment at any unquoted `#`; both stay literal here.
function escapeExpansions(command: string): string {
  let quote: "'" | '"' | null = null;
  let escaped = "";

  for (let index = 0; index < command.length; index += 1) {
    const char = command[index];

    if (quote === "'") {
      if (char === "'") {
        quote = null;
      }
      escaped += char;
      continue;
    }

    if (char === "\\") {
      escaped += command.slice(index, index + 2);
      index += 1;
      continue;
    }

    if (quote === '"') {
      if (char === '"') {
        quote = null;
      }
      escaped += char === "$" ? "\\$" : char;
      continue;
    }

    if (char === "'" || char === '"') {
      quote = char;
    }
    escaped += char === "$" || char === "#" ? `\\${char}` : char;
  }

  return escaped;
}

export function findQuotingError(command: string): string | null {
  let quote: "'" | '"' | null = null;

  for (let index = 0; index < command.length; index += 1) {
    const char = command[index];

    if (quote === "'") {
      if (char === "'") {
        quote = null;
      }
      continue;
    }

    if (char === "\\") {
      if (index === command.length - 1) {
        return "No escaped character";
      }
      index += 1;
      continue;
    }

    if (quote === '"') {
      if (char === '"') {
        quote = null;
      }
      continue;
    }

    if (char === "'" || char === '"') {
      quote = char;
    }
  }

  return quote === null ? null : "No closing quotation";
}
