/**
 * Frames
 *
 * A frame collects placed elements while a block or builtin builds it, then
 * is sealed. Sealed frames are shared freely between values and are never
 * modified again.
 */

import type { Element, PlacedElement } from './elements.js';
import type { Environment } from './environment.js';
import { BoundingBox, Vec2 } from './geometry.js';

export class Frame {
  private readonly placed: PlacedElement[] = [];
  private anchorPoint = Vec2.zero();
  private box = BoundingBox.empty();
  private sealed = false;

  /**
   * @param scope - Bindings made while building the frame, for `frame.name`
   */
  constructor(readonly scope?: Environment) {}

  get elements(): readonly PlacedElement[] {
    return this.placed;
  }

  /** Point where an adjoined frame is attached */
  get anchor(): Vec2 {
    return this.anchorPoint;
  }

  get boundingBox(): BoundingBox {
    return this.box;
  }

  get isSealed(): boolean {
    return this.sealed;
  }

  placeElement(offset: Vec2, element: Element): void {
    this.assertMutable();
    this.placed.push({ offset, element });
  }

  setAnchor(anchor: Vec2): void {
    this.assertMutable();
    this.anchorPoint = anchor;
  }

  unionBoundingBox(box: BoundingBox): void {
    this.assertMutable();
    this.box = this.box.union(box);
  }

  /** Copy another frame's elements and extent, shifted by an offset */
  placeFrame(offset: Vec2, frame: Frame): void {
    for (const { offset: inner, element } of frame.elements) {
      this.placeElement(offset.add(inner), element);
    }
    this.unionBoundingBox(frame.boundingBox.translate(offset));
  }

  seal(): this {
    this.sealed = true;
    return this;
  }

  private assertMutable(): void {
    if (this.sealed) {
      throw new Error('Cannot modify a sealed frame');
    }
  }
}
