/**
 * Geometry
 * 2D vectors and axis-aligned bounding boxes
 */

export class Vec2 {
  constructor(
    readonly x: number,
    readonly y: number
  ) {}

  static zero(): Vec2 {
    return new Vec2(0, 0);
  }

  add(other: Vec2): Vec2 {
    return new Vec2(this.x + other.x, this.y + other.y);
  }

  sub(other: Vec2): Vec2 {
    return new Vec2(this.x - other.x, this.y - other.y);
  }

  scale(factor: number): Vec2 {
    return new Vec2(this.x * factor, this.y * factor);
  }
}

interface Extent {
  readonly left: number;
  readonly top: number;
  readonly right: number;
  readonly bottom: number;
}

/**
 * Axis-aligned box, stored as its corners so that union is exact.
 *
 * The empty box has no extent. It is the identity of union and stays
 * empty under scaling and translation.
 */
export class BoundingBox {
  private constructor(private readonly extent: Extent | null) {}

  static empty(): BoundingBox {
    return new BoundingBox(null);
  }

  /**
   * Box with the given top-left corner and size.
   * @throws RangeError if the size is negative or not finite
   */
  static fromCorner(topLeft: Vec2, size: Vec2): BoundingBox {
    if (!(size.x >= 0 && size.y >= 0)) {
      throw new RangeError(
        `Bounding box size must be non-negative, got (${size.x}, ${size.y})`
      );
    }
    if (![topLeft.x, topLeft.y, size.x, size.y].every(Number.isFinite)) {
      throw new RangeError('Bounding box coordinates must be finite');
    }
    return new BoundingBox({
      left: topLeft.x,
      top: topLeft.y,
      right: topLeft.x + size.x,
      bottom: topLeft.y + size.y,
    });
  }

  /** Box of the given size at the origin */
  static sized(width: number, height: number): BoundingBox {
    return BoundingBox.fromCorner(Vec2.zero(), new Vec2(width, height));
  }

  /** Smallest box containing both points, in either order */
  static spanning(a: Vec2, b: Vec2): BoundingBox {
    return new BoundingBox({
      left: Math.min(a.x, b.x),
      top: Math.min(a.y, b.y),
      right: Math.max(a.x, b.x),
      bottom: Math.max(a.y, b.y),
    });
  }

  get isEmpty(): boolean {
    return this.extent === null;
  }

  get topLeft(): Vec2 {
    return this.extent ? new Vec2(this.extent.left, this.extent.top) : Vec2.zero();
  }

  get size(): Vec2 {
    return new Vec2(this.width, this.height);
  }

  get width(): number {
    return this.extent ? this.extent.right - this.extent.left : 0;
  }

  get height(): number {
    return this.extent ? this.extent.bottom - this.extent.top : 0;
  }

  get bottomRight(): Vec2 {
    return this.extent
      ? new Vec2(this.extent.right, this.extent.bottom)
      : Vec2.zero();
  }

  union(other: BoundingBox): BoundingBox {
    if (this.extent === null) return other;
    if (other.extent === null) return this;
    return new BoundingBox({
      left: Math.min(this.extent.left, other.extent.left),
      top: Math.min(this.extent.top, other.extent.top),
      right: Math.max(this.extent.right, other.extent.right),
      bottom: Math.max(this.extent.bottom, other.extent.bottom),
    });
  }

  /** Scale about the origin */
  scale(factor: number): BoundingBox {
    if (this.extent === null) return this;
    return BoundingBox.spanning(
      this.topLeft.scale(factor),
      this.bottomRight.scale(factor)
    );
  }

  translate(offset: Vec2): BoundingBox {
    if (this.extent === null) return this;
    return new BoundingBox({
      left: this.extent.left + offset.x,
      top: this.extent.top + offset.y,
      right: this.extent.right + offset.x,
      bottom: this.extent.bottom + offset.y,
    });
  }

  equals(other: BoundingBox): boolean {
    if (this.extent === null || other.extent === null) {
      return this.extent === other.extent;
    }
    return (
      this.extent.left === other.extent.left &&
      this.extent.top === other.extent.top &&
      this.extent.right === other.extent.right &&
      this.extent.bottom === other.extent.bottom
    );
  }
}
