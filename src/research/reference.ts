/**
 * Direct profile references: public profile URLs of the form
 * linkedin.com/in/<slug>, with or without scheme and www.
 */

const PROFILE_PATH = /(?:https?:\/\/)?(?:[a-z]{2,3}\.)?linkedin\.com\/in\/([^\s/?#]+)/i;

/** Canonical URL for the first profile reference in the text, or null. */
export function extractProfileReference(text: string): string | null {
  const match = text.match(PROFILE_PATH);
  if (!match) return null;
  return `https://www.linkedin.com/in/${match[1]}`;
}

/**
 * Display name derived from the profile slug: "jane-roe-4b2a91" -> "Jane Roe".
 * Tokens containing digits are treated as the disambiguation suffix and dropped.
 */
export function displayNameFromReference(reference: string): string {
  const match = reference.match(PROFILE_PATH);
  if (!match) return reference.trim();
  let slug = match[1];
  try {
    slug = decodeURIComponent(slug);
  } catch {
    // malformed escape; keep the raw slug
  }
  const words = slug
    .split(/[-_.]+/)
    .filter((w) => w.length > 0 && !/\d/.test(w))
    .map((w) => w.charAt(0).toUpperCase() + w.slice(1).toLowerCase());
  return words.length > 0 ? words.join(' ') : reference.trim();
}
