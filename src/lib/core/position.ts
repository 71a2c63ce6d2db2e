/**
 * Represents a cell position within an overmap tile.
 */
export class TilePosition {
  constructor(
    public readonly x: number,
    public readonly y: number,
    public readonly z: number
  ) {}

  /**
   * Create a string key for use in Sets or Maps.
   */
  toKey(): string {
    return `${this.x},${this.y},${this.z}`;
  }

  equals(other: TilePosition): boolean {
    return this.x === other.x && this.y === other.y && this.z === other.z;
  }

  toString(): string {
    return `<${this.x}, ${this.y}, ${this.z}>`;
  }
}
