/**
 * Genre inference from embedded genre tags and file names.
 *
 * Keywords live in src/presets/genreKeywords.json as an ordered list; the
 * first tag with a matching keyword wins. A keyword matches at the start of
 * a word, so "rap" does not match "trap".
 */

import * as path from 'path';
import keywordData from '../../presets/genreKeywords.json';
import { GENRE_TAGS } from '../../shared/types';
import type { GenreTag } from '../../shared/types';

export interface GenreKeywordRule {
  tag: GenreTag;
  keywords: string[];
}

/**
 * Type guard for GenreTag.
 */
export function isGenreTag(value: string): value is GenreTag {
  return (GENRE_TAGS as readonly string[]).includes(value);
}

/**
 * Lowercases and turns separators into single spaces:
 * "01_Trap-Beat (Final).wav" → "01 trap beat final wav"
 */
export function normalizeGenreText(text: string): string {
  return text
    .toLowerCase()
    .replace(/[_\-.,()[\]{}/\\]+/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

function loadRules(): GenreKeywordRule[] {
  return keywordData.map((rule) => {
    if (!isGenreTag(rule.tag)) {
      throw new Error(`genreKeywords.json names unknown genre "${rule.tag}"`);
    }
    return { tag: rule.tag, keywords: rule.keywords.map(normalizeGenreText) };
  });
}

const RULES = loadRules();

/**
 * Returns the first rule's tag whose keyword starts a word of `text`.
 */
export function matchGenreKeywords(
  text: string,
  rules: readonly GenreKeywordRule[] = RULES,
): GenreTag | null {
  const haystack = ` ${normalizeGenreText(text)}`;
  for (const rule of rules) {
    if (rule.keywords.some((keyword) => haystack.includes(` ${keyword}`))) {
      return rule.tag;
    }
  }
  return null;
}

/**
 * Infers a genre tag for a file. Embedded genre tags are tried first, then
 * the file name without extension.
 *
 * @returns null when nothing matched (the default preset applies)
 */
export function inferGenreTag(filePath: string, metadataGenres: readonly string[] = []): GenreTag | null {
  for (const genre of metadataGenres) {
    const normalized = normalizeGenreText(genre).replace(/ /g, '_');
    if (isGenreTag(normalized)) {
      return normalized;
    }
    const matched = matchGenreKeywords(genre);
    if (matched) {
      return matched;
    }
  }

  const stem = path.basename(filePath, path.extname(filePath));
  return matchGenreKeywords(stem);
}
