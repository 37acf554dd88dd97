const LABELLED_LINE = /^(?:final\s+)?(?:verdict|result|label|decision|answer)\s*[:=-]\s*(.*)$/i;

const NEGATION_BEFORE = /\b(?:not|no|never)[\s-]+$/i;

interface TokenMatch {
  readonly token: string;
  readonly negated: boolean;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function cleanLine(line: string): string {
  return line.replace(/[*_#>`]/g, '').trim();
}

function scanTokens(segment: string, pattern: RegExp, upperCaseOnly: boolean): TokenMatch[] {
  const found: TokenMatch[] = [];
  for (const match of segment.matchAll(pattern)) {
    const token = match[2];
    if (upperCaseOnly && token !== token.toUpperCase()) continue;
    const prefixed = match[1] !== undefined;
    const negated = prefixed || NEGATION_BEFORE.test(segment.slice(0, match.index ?? 0));
    found.push({ token, negated });
  }
  return found;
}

/**
 * Finds the decision token in free-form model output.
 *
 * 1. The last labelled line (`Verdict: X`, `Final Result: X`, `Decision - X`, ...) decides; the
 *    keyword match ignores case and markdown emphasis. A labelled line with nothing after the
 *    separator is a heading and is skipped.
 * 2. Otherwise the last non-empty line is used if it names a token in upper case.
 *
 * In either case the line must name exactly one distinct token, not negated (`NOT REAL`,
 * `no SUPPORTED`, `UNSUPPORTED`). Anything else returns undefined.
 */
export function parseLabel<T extends string>(text: string, labels: readonly T[]): T | undefined {
  if (labels.length === 0) return undefined;

  const alternation = labels.map(escapeRegExp).join('|');
  const tokenPattern = new RegExp(`(?<![A-Za-z])(un-?|non-?)?(${alternation})(?![A-Za-z])`, 'gi');

  const lines = text
    .split(/\r?\n/)
    .map(cleanLine)
    .filter((line) => line.length > 0);

  const decide = (matches: readonly TokenMatch[]): T | undefined => {
    const distinct = new Set(matches.map((m) => m.token.toUpperCase()));
    if (distinct.size !== 1 || matches.some((m) => m.negated)) return undefined;
    const [token] = distinct;
    return labels.find((label) => label.toUpperCase() === token);
  };

  for (let i = lines.length - 1; i >= 0; i--) {
    const labelled = LABELLED_LINE.exec(lines[i]);
    if (labelled && labelled[1].length > 0) {
      return decide(scanTokens(labelled[1], tokenPattern, false));
    }
  }

  const lastLine = lines.at(-1);
  if (lastLine === undefined || LABELLED_LINE.test(lastLine)) return undefined;

  return decide(scanTokens(lastLine, tokenPattern, true));
}
