/**
 * Bullet grammar for model output:
 *
 *   line   := ws* marker ws+ text
 *   marker := "-" | "*" | "+" | "•" | digits ("." | ")")
 *
 * Emphasis markers (`**`, `__`) and wrapping backticks are removed from the text, then
 * whitespace is trimmed. Lines that are not bullets are ignored.
 */
const BULLET_PATTERN = /^\s*(?:[-*+•]|\d+[.)])\s+(.*)$/;

export function stripMarkup(text: string): string {
  let result = text.replace(/\*\*|__/g, '').trim();
  while (result.length > 1 && result.startsWith('`') && result.endsWith('`')) {
    result = result.slice(1, -1).trim();
  }
  return result;
}

export function parseBulletList(text: string): string[] {
  const items: string[] = [];

  for (const line of text.split(/\r?\n/)) {
    const match = BULLET_PATTERN.exec(line);
    if (!match) continue;

    const item = stripMarkup(match[1]);
    if (item && !items.includes(item)) {
      items.push(item);
    }
  }

  return items;
}

/**
 * Bullets when there are any; otherwise the whole response, whitespace-collapsed, as a single
 * item. Returns an empty list only for a blank response.
 */
export function parseAssumptions(text: string, maxItems: number): string[] {
  const bullets = parseBulletList(text);
  if (bullets.length > 0) {
    return bullets.slice(0, maxItems);
  }

  const whole = stripMarkup(text).replace(/\s+/g, ' ');
  return whole ? [whole] : [];
}
