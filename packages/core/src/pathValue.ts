/**
 * Filesystem path held natively at the raw and object stages.
 */
export class PathValue {
  public readonly path: string;

  constructor(path: string) {
    this.path = path;
    Object.freeze(this);
  }

  equals(other: PathValue): boolean {
    return this.path === other.path;
  }

  toString(): string {
    return this.path;
  }
}
