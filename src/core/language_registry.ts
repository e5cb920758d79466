import { UnresolvedLanguageError } from './errors.js';

/**
 * Languages with CoreNLP models. Each entry accepts the full English name and
 * its ISO-639-1 / ISO-639-2 codes.
 */
export const LANGUAGES = [
  { language: 'english', codes: ['en', 'eng', 'english'] },
  { language: 'german', codes: ['de', 'ger', 'deu', 'german'] },
  { language: 'french', codes: ['fr', 'fre', 'fra', 'french'] },
  { language: 'arabic', codes: ['ar', 'ara', 'arabic'] },
  { language: 'chinese', codes: ['ch', 'chi', 'zh', 'zho', 'chinese'] },
  { language: 'spanish', codes: ['es', 'spa', 'spanish'] },
  { language: 'xinhua', codes: ['xi', 'xin', 'xinhua'] },
] as const;

export type LanguageCode = (typeof LANGUAGES)[number]['language'];

const REGISTRY: ReadonlyArray<{ language: LanguageCode; codes: ReadonlySet<string> }> =
  LANGUAGES.map(({ language, codes }) => ({ language, codes: new Set<string>(codes) }));

function assertDisjoint(): void {
  const owner = new Map<string, LanguageCode>();
  for (const { language, codes } of REGISTRY) {
    for (const code of codes) {
      const previous = owner.get(code);
      if (previous) {
        throw new Error(`Language code "${code}" is shared by ${previous} and ${language}`);
      }
      owner.set(code, language);
    }
  }
}

assertDisjoint();

export function supportedLanguages(): LanguageCode[] {
  return REGISTRY.map((entry) => entry.language);
}

export function isLanguageCode(value: string): value is LanguageCode {
  return REGISTRY.some((entry) => entry.language === value);
}

/** Lookup that returns null instead of throwing. */
export function tryResolveLanguage(token: string): LanguageCode | null {
  const needle = token.trim().toLowerCase();
  const hit = REGISTRY.find((entry) => entry.codes.has(needle));
  return hit ? hit.language : null;
}

export function resolveLanguage(token: string): LanguageCode {
  const language = tryResolveLanguage(token);
  if (!language) throw new UnresolvedLanguageError(token);
  return language;
}
