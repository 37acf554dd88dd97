import type { EvidenceItem } from '@newscheck/shared/src/types/verification.types.js';
import { normalizeUrl } from './url.js';

function mentionsUrl(loweredText: string, url: string): boolean {
  const forms = [url.trim(), normalizeUrl(url)].map((form) =>
    form.replace(/\/+$/, '').toLowerCase(),
  );
  return forms.some((form) => form.length > 0 && loweredText.includes(form));
}

function referencesIndex(text: string, index: number): boolean {
  const n = String(index);
  const bracketed = new RegExp(`\\[(?:\\s*\\d+\\s*,)*\\s*${n}\\s*(?:,\\s*\\d+\\s*)*\\]`);
  const named = new RegExp(`\\b(?:source|evidence|result)\\s*#?\\s*${n}\\b`, 'i');
  return bracketed.test(text) || named.test(text);
}

/**
 * URLs of the evidence items the rationale refers to, in evidence order. An item counts as
 * cited when its URL appears in the text (as given or normalised) or its 1-based index is
 * referenced as `[n]`, `[1, n]`, `source n` or `evidence n`.
 */
export function matchCitations(rationale: string, evidence: readonly EvidenceItem[]): string[] {
  const lowered = rationale.toLowerCase();
  const cited: string[] = [];

  evidence.forEach((item, i) => {
    const referenced = mentionsUrl(lowered, item.url) || referencesIndex(rationale, i + 1);
    if (referenced && !cited.includes(item.url)) {
      cited.push(item.url);
    }
  });

  return cited;
}
