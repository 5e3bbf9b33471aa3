/**
 * SEO metadata derived from the raw prompt. Pure, no I/O.
 */

import type { SeoMetadata } from "@/lib/types";

export const FALLBACK_TITLE = "Crimson Site";
export const DESCRIPTION_PREFIX = "Auto-generated website: ";

const MAX_TITLE_LENGTH = 60;
const MAX_KEYWORDS = 8;
const ALPHABETIC = /^\p{L}+$/u;

// Counts code points so emoji and astral characters are never split in half
export function truncate(text: string, max: number): string {
  const chars = Array.from(text);
  return chars.length > max ? chars.slice(0, max).join("") : text;
}

function capitalizeFirst(text: string): string {
  const [first = "", ...rest] = Array.from(text);
  return first.toUpperCase() + rest.join("");
}

export function extractSeoMetadata(prompt: string): SeoMetadata {
  const trimmed = prompt.trim();
  const title = truncate(capitalizeFirst(trimmed), MAX_TITLE_LENGTH);

  const keywords = prompt
    .toLowerCase()
    .split(/\s+/)
    .filter((word) => ALPHABETIC.test(word))
    .slice(0, MAX_KEYWORDS)
    .join(", ");

  return {
    title: title || FALLBACK_TITLE,
    description: `${DESCRIPTION_PREFIX}${trimmed}`,
    keywords,
  };
}
