export class CriteriaTooDeepError extends Error {
  override readonly name = 'CriteriaTooDeepError';

  constructor(readonly maxDepth: number) {
    super(`Criteria nesting exceeds the maximum depth of ${maxDepth}`);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
