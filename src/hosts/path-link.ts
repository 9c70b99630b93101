/**
 * Value Object: PathLink
 *
 * Identity of a routing rule: the (hostname, path) pair. Both empty means
 * "no link".
 */
export class PathLink {
  private constructor(
    readonly hostname: string,
    readonly path: string,
  ) {}

  static create(hostname: string, path: string): PathLink {
    return new PathLink(hostname, path);
  }

  /**
   * The "no link" sentinel.
   */
  static empty(): PathLink {
    return new PathLink("", "");
  }

  isEmpty(): boolean {
    return this.hostname === "" && this.path === "";
  }

  /**
   * Order by hostname ascending, then by path. Route matching wants the
   * longest path first, so `reversePath` flips the path order only.
   */
  less(other: PathLink, reversePath: boolean): boolean {
    if (this.hostname === other.hostname) {
      return reversePath ? this.path > other.path : this.path < other.path;
    }
    return this.hostname < other.hostname;
  }

  equals(other: PathLink): boolean {
    return this.hostname === other.hostname && this.path === other.path;
  }

  toString(): string {
    return `${this.hostname}${this.path}`;
  }

  toJSON(): { hostname: string; path: string } {
    return { hostname: this.hostname, path: this.path };
  }
}

/**
 * Comparator for Array.prototype.sort built on {@link PathLink.less}.
 */
export function comparePathLinks(reversePath: boolean): (a: PathLink, b: PathLink) => number {
  return (a, b) => {
    if (a.less(b, reversePath)) return -1;
    if (b.less(a, reversePath)) return 1;
    return 0;
  };
}
