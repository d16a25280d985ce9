const wrapWidth = 54;

/**
 * The export hard-wraps the reference column every 54 characters and inserts
 * a continuation space. Positions are re-evaluated against the shortened
 * string after each removal. A genuine space that lands on a wrap position
 * is removed as well.
 */
export const removeWrapWhitespace = (reference: string): string => {
  let value = reference;

  for (let i = wrapWidth - 1; i < value.length; i += wrapWidth) {
    if (value[i] === ' ') {
      value = value.slice(0, i) + value.slice(i + 1);
    }
  }

  return value;
};
