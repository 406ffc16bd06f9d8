export function normalizeUsername(username: string): string {
  return username.trim().replace(/^@/, "").toLowerCase();
}

export function tokenizeWhitespace(content: string): string[] {
  return content.split(/\s+/).filter((token) => token.length > 0);
}

export function trimTrailingSlash(url: string): string {
  return url.replace(/\/+$/, "");
}

export function safeFileSegment(value: string): string {
  return value.replace(/[^A-Za-z0-9._-]/g, "_").replace(/^\.+/, "_");
}
