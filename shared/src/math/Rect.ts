// ═══════════════════════════════════════════════════════════════════
// RECT
// 2D axis-aligned rectangle
//
// Hitbox and overlay primitive. Screen/world convention: +X right,
// +Y down, (x, y) is the top-left corner.
//
// Attack hitboxes are authored in facing-right local space and
// placed into the world with mirrorAbout() when the owner faces left.
// ═══════════════════════════════════════════════════════════════════

export class Rect {
  constructor(
    public x: number,
    public y: number,
    public width: number,
    public height: number,
  ) {}

  // ── Factories ─────────────────────────────────────────────────

  /** Rectangle centred on a point with full dimensions */
  static fromCenter(cx: number, cy: number, width: number, height: number): Rect {
    return new Rect(cx - width / 2, cy - height / 2, width, height);
  }

  // ── Queries ───────────────────────────────────────────────────

  get minX(): number { return this.x; }
  get minY(): number { return this.y; }
  get maxX(): number { return this.x + this.width; }
  get maxY(): number { return this.y + this.height; }
  get centerX(): number { return this.x + this.width / 2; }
  get centerY(): number { return this.y + this.height / 2; }

  /** Strict overlap (touching edges do not overlap) */
  overlaps(o: Rect): boolean {
    return this.minX < o.maxX && this.maxX > o.minX
        && this.minY < o.maxY && this.maxY > o.minY;
  }

  equals(o: Rect): boolean {
    return this.x === o.x && this.y === o.y
        && this.width === o.width && this.height === o.height;
  }

  clone(): Rect {
    return new Rect(this.x, this.y, this.width, this.height);
  }

  // ── Transforms ────────────────────────────────────────────────

  /**
   * New rectangle reflected horizontally about a vertical line at anchorX.
   * The vertical extent is untouched.
   */
  mirrorAbout(anchorX: number): Rect {
    return new Rect(2 * anchorX - this.x - this.width, this.y, this.width, this.height);
  }

  /**
   * Place a facing-right local rectangle relative to an anchor.
   * Facing left: x' = anchorX - localX - width.
   */
  static place(local: Rect, anchorX: number, anchorY: number, facingRight: boolean): Rect {
    const right = new Rect(anchorX + local.x, anchorY + local.y, local.width, local.height);
    return facingRight ? right : right.mirrorAbout(anchorX);
  }

  toString(): string {
    return `Rect(${this.x}, ${this.y}, ${this.width}x${this.height})`;
  }
}
