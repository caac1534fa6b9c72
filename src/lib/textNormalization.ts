const DASH_VARIANTS = /[‐‑‒–—―−]/g;

export function sanitizeExtractedText(value: string): string {
  return value
    .replace(/\uFEFF/g, "")
    .replace(/\u00A0/g, " ")
    .replace(/(\d)\s*\uFFFD\s*(\d)/g, "$1-$2")
    .replace(/\uFFFD/g, "-")
    .replace(DASH_VARIANTS, "-");
}

/**
 * Human-readable cleanup applied to cells when a questionnaire is loaded.
 * Keeps case and punctuation; only folds encoding noise and whitespace.
 */
export function cleanCellText(value: string | null | undefined): string {
  if (!value) {
    return "";
  }

  return sanitizeExtractedText(value).normalize("NFKC").replace(/\s+/g, " ").trim();
}

// Every punctuation run except %, #, & and @, which change meaning ("99%", "C#", "R&D").
const FOLDED_PUNCTUATION = /(?:(?![%#&@])\p{P})+/gu;

/**
 * Canonical form used for every comparison: case, whitespace and punctuation
 * are folded so "Do you have a privacy policy?" and "do you have a  privacy policy"
 * compare equal. Symbols (">=", "$", "+") and combining marks are kept.
 */
export function normalizeText(value: string | null | undefined): string {
  if (!value) {
    return "";
  }

  return sanitizeExtractedText(value)
    .normalize("NFKC")
    .toLowerCase()
    .replace(FOLDED_PUNCTUATION, " ")
    .replace(/\s+/g, " ")
    .trim();
}
