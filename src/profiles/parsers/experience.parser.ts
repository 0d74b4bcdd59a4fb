const INTEGER_PATTERN = /^[+-]?\d+$/;

/** Whole, non-negative years written with digits; "-0" reads as 0. */
export function parseExperienceYears(text: string): number | null {
  const normalized = text.trim();
  if (!INTEGER_PATTERN.test(normalized)) {
    return null;
  }
  const years = Number(normalized);
  if (!Number.isSafeInteger(years) || years < 0) {
    return null;
  }
  return years === 0 ? 0 : years;
}
