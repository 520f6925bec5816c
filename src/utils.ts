import path from "node:path";

const DEFAULT_EXTENSIONS = ["pdf"];

/** "pdf, .PDF,ai" -> ["pdf", "ai"] */
export function parseExtensions(filter: string): string[] {
  const seen = new Set<string>();
  for (const raw of filter.split(",")) {
    const ext = raw.trim().replace(/^\.+/, "").toLowerCase();
    if (ext) seen.add(ext);
  }
  return [...seen];
}

export function defaultExtensions(): string[] {
  return [...DEFAULT_EXTENSIONS];
}

export function hasAllowedExtension(filePath: string, extensions: readonly string[]): boolean {
  const ext = path.extname(filePath).toLowerCase().slice(1);
  return ext !== "" && extensions.includes(ext);
}

export function formatBytes(bytes: number): string {
  const units = ["B", "KB", "MB", "GB"];
  let size = bytes;
  let unit = 0;

  while (size >= 1024 && unit < units.length - 1) {
    size /= 1024;
    unit++;
  }

  return `${size.toFixed(2)} ${units[unit]}`;
}

export function formatDuration(ms: number): string {
  const seconds = Math.floor(ms / 1000);
  const minutes = Math.floor(seconds / 60);
  return minutes > 0 ? `${minutes}m ${seconds % 60}s` : `${(ms / 1000).toFixed(2)}s`;
}

export function formatRatio(ratio: number): string {
  return `${(ratio * 100).toFixed(1)}%`;
}

/**
 * Splits a raw option string into tokens. Whitespace separates tokens,
 * single or double quotes group them and are dropped.
 */
export function tokenizeOptions(raw: string): string[] {
  const tokens: string[] = [];
  let current = "";
  let quote: "'" | '"' | null = null;
  let inToken = false;

  for (const ch of raw) {
    if (quote) {
      if (ch === quote) {
        quote = null;
      } else {
        current += ch;
      }
      continue;
    }
    if (ch === "'" || ch === '"') {
      quote = ch;
      inToken = true;
      continue;
    }
    if (/\s/.test(ch)) {
      if (inToken) {
        tokens.push(current);
        current = "";
        inToken = false;
      }
      continue;
    }
    current += ch;
    inToken = true;
  }

  if (quote) {
    throw new Error(`unterminated ${quote} quote in options: ${raw}`);
  }
  if (inToken) tokens.push(current);
  return tokens;
}
