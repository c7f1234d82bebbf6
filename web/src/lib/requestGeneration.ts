/**
 * Generation counter for discarding out-of-order async results
 *
 * Each request takes a token from `next()`; when its result arrives it is
 * applied only if `isCurrent(token)` still holds.
 */
export class RequestGeneration {
  private current = 0;

  next(): number {
    this.current += 1;
    return this.current;
  }

  isCurrent(token: number): boolean {
    return token === this.current;
  }

  /** Retires every token handed out so far */
  invalidate(): void {
    this.current += 1;
  }
}
