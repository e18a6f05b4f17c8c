/**
 * Method keys on the current root-to-node path. Values are immutable:
 * `with` returns a new path sharing its prefix, so sibling branches never see
 * each other's additions.
 */
export class VisitedPath {
  private constructor(
    private readonly key: string,
    private readonly parent: VisitedPath | null,
  ) {}

  static of(key: string): VisitedPath {
    return new VisitedPath(key, null);
  }

  with(key: string): VisitedPath {
    return new VisitedPath(key, this);
  }

  has(key: string): boolean {
    for (let cur: VisitedPath | null = this; cur; cur = cur.parent) {
      if (cur.key === key) return true;
    }
    return false;
  }
}
