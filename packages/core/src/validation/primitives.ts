export const isNonEmptyString = (value: unknown): value is string =>
  typeof value === 'string' && value.length > 0;

export const isNonBlankString = (value: unknown): value is string =>
  typeof value === 'string' && value.trim().length > 0;

export const isFiniteNumber = (value: unknown): value is number =>
  typeof value === 'number' && Number.isFinite(value);

export const isNonNegativeInteger = (value: unknown): value is number =>
  typeof value === 'number' && Number.isInteger(value) && value >= 0;

/**
 * Parses a persisted numeric attribute. Blank and non-numeric text yields
 * `undefined` rather than `0`.
 */
export const parseFiniteNumber = (text: string | undefined): number | undefined => {
  if (!isNonBlankString(text)) {
    return undefined;
  }
  const value = Number(text);
  return isFiniteNumber(value) ? value : undefined;
};

export const parseNonNegativeInteger = (
  text: string | undefined,
): number | undefined => {
  const value = parseFiniteNumber(text);
  return isNonNegativeInteger(value) ? value : undefined;
};

/**
 * Accepts `true`/`false` in any case. Anything else is `undefined`.
 */
export const parseBooleanFlag = (text: string | undefined): boolean | undefined => {
  if (text === undefined) {
    return undefined;
  }
  const normalized = text.trim().toLowerCase();
  if (normalized === 'true') {
    return true;
  }
  if (normalized === 'false') {
    return false;
  }
  return undefined;
};
