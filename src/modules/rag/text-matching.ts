const escapeRegExp = (value: string): string => value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

const phrasePatternCache = new Map<string, RegExp>();

// Matches a vocabulary phrase on word boundaries, tolerating a plural suffix.
export const buildPhrasePattern = (phrase: string): RegExp => {
  const normalized = phrase.trim().toLowerCase();
  const cached = phrasePatternCache.get(normalized);
  if (cached) {
    return cached;
  }

  const body = escapeRegExp(normalized).replace(/\s+/g, "\\s+");
  const pattern = new RegExp(`(?<![a-z0-9])${body}(?:s|es)?(?![a-z0-9])`, "i");
  phrasePatternCache.set(normalized, pattern);
  return pattern;
};

export const containsPhrase = (text: string, phrase: string): boolean => buildPhrasePattern(phrase).test(text);

export const containsAnyPhrase = (text: string, phrases: readonly string[]): boolean =>
  phrases.some((phrase) => containsPhrase(text, phrase));

export const replacePhrase = (text: string, phrase: string, replacement: string): string => {
  const pattern = buildPhrasePattern(phrase);
  return text.replace(new RegExp(pattern.source, "gi"), () => replacement);
};

export const normalizeWhitespace = (value: string): string => value.replace(/\s+/g, " ").trim();

export const normalizeForComparison = (value: string): string =>
  normalizeWhitespace(
    value
      .toLowerCase()
      .replace(/[^\p{L}\p{N}\s]/gu, " ")
  );
