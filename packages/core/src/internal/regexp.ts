/**
 * @internal
 * `RegExp.prototype.test` without carrying `lastIndex` over to the next call.
 */
export const testRegExp = (pattern: RegExp, text: string): boolean => {
  const result = pattern.test(text);
  if (pattern.global || pattern.sticky) pattern.lastIndex = 0;
  return result;
};
