// ═══════════════════════════════════════════════════════════════════
// INPUT MANAGER
// Centralizes keyboard input. Other systems read state via clean
// getters instead of raw event listeners.
//
// PATTERN: Call endFrame() at the end of each game loop iteration
// to reset per-frame press/release edges.
// ═══════════════════════════════════════════════════════════════════

/** Horizontal intent plus movement triggers */
export interface MovementInput {
  /** -1 left, 0 none, 1 right */
  axis: number;
  jumpPressed: boolean;
  dashPressed: boolean;
}

/** Combat triggers; `*Pressed` / `*Released` are true only on the edge frame */
export interface CombatInput {
  attackPressed: boolean;
  ultimatePressed: boolean;
  ultimateHeld: boolean;
  ultimateReleased: boolean;
}

export type InputAction = 'left' | 'right' | 'jump' | 'dash' | 'attack' | 'ultimate';

export type KeyBindings = Readonly<Record<InputAction, readonly string[]>>;

export const DEFAULT_BINDINGS: KeyBindings = {
  left:     ['KeyA', 'ArrowLeft'],
  right:    ['KeyD', 'ArrowRight'],
  jump:     ['Space', 'KeyW'],
  dash:     ['ShiftLeft', 'ShiftRight'],
  attack:   ['KeyJ', 'KeyF'],
  ultimate: ['KeyK', 'KeyR'],
};

const NO_COMBAT: CombatInput = {
  attackPressed: false,
  ultimatePressed: false,
  ultimateHeld: false,
  ultimateReleased: false,
};

function keyCode(e: Event): string | null {
  return 'code' in e && typeof e.code === 'string' ? e.code : null;
}

export class InputManager {
  private keys = new Set<string>();
  private pressedThisFrame = new Set<string>();
  private releasedThisFrame = new Set<string>();
  private target: EventTarget | null = null;

  /** When true, movement and combat input read as idle (UI is blocking) */
  uiBlocked = false;

  constructor(private readonly bindings: KeyBindings = DEFAULT_BINDINGS) {}

  // ── Lifecycle ──────────────────────────────────────────────

  /** Listen for keydown/keyup on a window, document or canvas */
  attach(target: EventTarget): void {
    this.detach();
    this.target = target;
    target.addEventListener('keydown', this.onKeyDown);
    target.addEventListener('keyup', this.onKeyUp);
  }

  detach(): void {
    if (!this.target) return;
    this.target.removeEventListener('keydown', this.onKeyDown);
    this.target.removeEventListener('keyup', this.onKeyUp);
    this.target = null;
  }

  // ── Raw key state ──────────────────────────────────────────

  press(code: string): void {
    if (this.keys.has(code)) return; // auto-repeat
    this.keys.add(code);
    this.pressedThisFrame.add(code);
  }

  release(code: string): void {
    if (!this.keys.delete(code)) return;
    this.releasedThisFrame.add(code);
  }

  held(code: string): boolean {
    return this.keys.has(code);
  }

  // ── Actions ────────────────────────────────────────────────

  isHeld(action: InputAction): boolean {
    return this.bindings[action].some((code) => this.keys.has(code));
  }

  wasPressed(action: InputAction): boolean {
    return this.bindings[action].some((code) => this.pressedThisFrame.has(code));
  }

  /** Released this frame and no other bound key still holds it */
  wasReleased(action: InputAction): boolean {
    return !this.isHeld(action)
      && this.bindings[action].some((code) => this.releasedThisFrame.has(code));
  }

  getMovement(): MovementInput {
    if (this.uiBlocked) return { axis: 0, jumpPressed: false, dashPressed: false };
    return {
      axis: (this.isHeld('right') ? 1 : 0) - (this.isHeld('left') ? 1 : 0),
      jumpPressed: this.wasPressed('jump'),
      dashPressed: this.wasPressed('dash'),
    };
  }

  /** Combat triggers for this frame */
  getCombat(): CombatInput {
    if (this.uiBlocked) return NO_COMBAT;
    return {
      attackPressed: this.wasPressed('attack'),
      ultimatePressed: this.wasPressed('ultimate'),
      ultimateHeld: this.isHeld('ultimate'),
      ultimateReleased: this.wasReleased('ultimate'),
    };
  }

  // ── Frame lifecycle ────────────────────────────────────────

  /** Call at the END of each frame to reset edges */
  endFrame(): void {
    this.pressedThisFrame.clear();
    this.releasedThisFrame.clear();
  }

  // ── Event handlers (arrow functions for stable `this`) ─────

  private onKeyDown = (e: Event): void => {
    const code = keyCode(e);
    if (code !== null) this.press(code);
  };

  private onKeyUp = (e: Event): void => {
    const code = keyCode(e);
    if (code !== null) this.release(code);
  };
}

export const inputManager = new InputManager();
