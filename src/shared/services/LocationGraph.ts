import { DistanceIndex } from '../types/LocationTypes';

export class UnknownLocationError extends Error {
  public readonly code = 'UNKNOWN_LOCATION';

  constructor(public readonly locationName: string) {
    super(`Location not found in distance index: ${locationName}`);
    this.name = 'UnknownLocationError';
  }
}

/**
 * Read-only distance lookup between named locations.
 *
 * Built once from a DistanceIndex and shared by every route computation;
 * nothing here mutates after construction.
 */
export class LocationGraph {
  private readonly index: DistanceIndex;

  constructor(index: DistanceIndex) {
    this.index = index;
  }

  /**
   * Distance between two named locations. Identical names are 0 without a
   * lookup; otherwise both names must exist in the index.
   * @throws UnknownLocationError when either name is absent
   */
  distance(from: string, to: string): number {
    if (from === to) return 0;
    const row = this.rowOf(from);
    const col = this.rowOf(to);
    return this.index.matrix[row][col];
  }

  has(name: string): boolean {
    return this.index.indices.has(name);
  }

  /** Location names in index row order */
  locationNames(): string[] {
    return [...this.index.names];
  }

  /** Names absent from the index, first-seen order, no duplicates */
  findUnknown(names: Iterable<string>): string[] {
    const unknown = new Set<string>();
    for (const name of names) {
      if (!this.has(name)) unknown.add(name);
    }
    return [...unknown];
  }

  get size(): number {
    return this.index.names.length;
  }

  private rowOf(name: string): number {
    const row = this.index.indices.get(name);
    if (row === undefined) {
      throw new UnknownLocationError(name);
    }
    return row;
  }
}
