/**
 * Strip provider artifacts from article text before it is stored and scored.
 */

const ARTIFACT_PATTERNS: RegExp[] = [
  // "(NASDAQ:AAPL – Free Report)" style promo tags
  /\([A-Z]+:[A-Z.]+\s*[–-]\s*Free Report\)/gi,
  /\((?:NYSE|NASDAQ|AMEX):[A-Z.]+\)/g,
  /Subscribe to [^.]*newsletter\.?/gi,
  /Sign up [^.]*newsletter\.?/gi,
  /Click here [^.]*\.?/gi,
  /Follow [^.]* on Twitter\.?/gi,
  /This story originally appeared[^]*$/i,
  /Originally published[^]*$/i,
];

/**
 * Remove NewsAPI truncation markers ("… [+1234 chars]") and promotional artifacts,
 * then collapse whitespace.
 */
export function cleanArticleText(text: string | null | undefined): string {
  if (!text) return '';
  let cleaned = text.split('[+')[0];
  for (const pattern of ARTIFACT_PATTERNS) {
    cleaned = cleaned.replace(pattern, '');
  }
  return cleaned
    .replace(/\n\s*\n\s*\n+/g, '\n\n')
    .replace(/[ \t]+/g, ' ')
    .replace(/ +([.,;:!?])/g, '$1')
    .trim();
}
