/**
 * Resolve a process display name to the protected-app keyword it falls under.
 *
 * Both sides are lowercased and stripped of spaces, dots, dashes and
 * underscores before the substring test, so "chat-app" covers "Chat App",
 * "chat_app" and "ChatApp Helper". Keywords are checked in configured order
 * and the first hit wins.
 */
export function matchAppKey(
  displayName: string | null | undefined,
  keywords: readonly string[]
): string | null {
  if (!displayName) return null;

  const name = normalizeToken(displayName);
  if (!name) return null;

  for (const keyword of keywords) {
    const token = normalizeToken(keyword);
    if (token && name.includes(token)) {
      return keyword;
    }
  }
  return null;
}

export function normalizeToken(input: string): string {
  return input.trim().toLowerCase().replace(/[\s._-]+/g, '');
}
