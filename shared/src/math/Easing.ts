// ═══════════════════════════════════════════════════════════════════
// EASING CURVES
// All curves map [0, 1] → [0, 1] with f(0) = 0 and f(1) = 1.
// ═══════════════════════════════════════════════════════════════════

export enum EasingKind {
  LINEAR      = 'linear',
  EASE_IN     = 'ease_in',
  EASE_OUT    = 'ease_out',
  EASE_IN_OUT = 'ease_in_out',
}

export function clamp01(t: number): number {
  return t < 0 ? 0 : t > 1 ? 1 : t;
}

/** Quadratic ease-in-out */
export function easeInOutQuad(t: number): number {
  return t < 0.5 ? 2 * t * t : 1 - Math.pow(-2 * t + 2, 2) / 2;
}

/** Cubic ease-in-out */
export function easeInOutCubic(t: number): number {
  return t < 0.5 ? 4 * t * t * t : 1 - Math.pow(-2 * t + 2, 3) / 2;
}

export function applyEasing(kind: EasingKind, t: number): number {
  const p = clamp01(t);
  switch (kind) {
    case EasingKind.LINEAR:      return p;
    case EasingKind.EASE_IN:     return p * p;
    case EasingKind.EASE_OUT:    return 1 - (1 - p) * (1 - p);
    case EasingKind.EASE_IN_OUT: return easeInOutQuad(p);
  }
}
