// ═══════════════════════════════════════════════════════════════════
// COMBAT FSM
// Lightweight tagged state machine
//
//   • Tagged states  (attacking, canDamage, locksInput)
//   • Nested states  (attacking.light → attacking.combo)
//   • Entry / exit / transition actions
//   • Guarded transitions
//   • Delayed "after" transitions measured in seconds of update(dt),
//     never wall-clock timers, so a simulated clock drives everything
//   • send() / matches() / hasTag() API
//
// Usage:
//   const fsm = new CombatFSM(ATTACK_STATES, actions, guards);
//   fsm.send('light');
//   fsm.update(dt);
//   if (fsm.hasTag('canDamage')) { ... }
// ═══════════════════════════════════════════════════════════════════

// ── Type definitions ─────────────────────────────────────────────

export interface StateNode {
  /** entry action name(s) to call on entering this state */
  entry?: string | string[];
  /** exit action name(s) to call on leaving this state */
  exit?: string | string[];
  /** event → target state ID */
  on?: Record<string, string | TransitionDef>;
  /** tags attached to this state */
  tags?: string[];
  /** auto-transition after N seconds in the state: { [seconds]: targetStateId } */
  after?: Record<number, string>;
  /** nested child states */
  states?: Record<string, StateNode>;
  /** which child state to enter by default */
  initial?: string;
  type?: 'final';
}

export interface TransitionDef {
  target: string;
  /** optional guard name */
  cond?: string;
  /** action name(s) run between exit and entry */
  actions?: string | string[];
}

export interface FSMConfig {
  id: string;
  initial: string;
  states: Record<string, StateNode>;
}

export type FSMPayload = Readonly<Record<string, unknown>>;

/** Actions map: actionName → callback(event, payload) */
export type ActionMap = Record<string, (event: string, payload?: FSMPayload) => void>;
/** Guards map: guardName → predicate */
export type GuardMap = Record<string, (payload?: FSMPayload) => boolean>;

interface PendingAfter {
  delay: number;
  target: string;
  /** true when the timer belongs to the child state */
  child: boolean;
}

// ── Helpers ──────────────────────────────────────────────────────

function resolveTarget(target: string): { root: string; child?: string } {
  // "#attack.idle" → "idle"
  if (target.startsWith('#')) {
    const dotIdx = target.indexOf('.');
    if (dotIdx >= 0) return { root: target.slice(dotIdx + 1) };
    return { root: target.slice(1) };
  }
  const [root, child] = target.split('.');
  return child === undefined ? { root } : { root, child };
}

function toList(names: string | string[] | undefined): string[] {
  if (names === undefined) return [];
  return Array.isArray(names) ? names : [names];
}

/** Shortest delay of an `after` block, or null */
function firstAfter(node: StateNode): { delay: number; target: string } | null {
  if (!node.after) return null;
  let best: { delay: number; target: string } | null = null;
  for (const [key, target] of Object.entries(node.after)) {
    const delay = Number.parseFloat(key);
    if (Number.isNaN(delay)) continue;
    if (best === null || delay < best.delay) best = { delay: Math.max(0, delay), target };
  }
  return best;
}

// ═══════════════════════════════════════════════════════════════════

export class CombatFSM {
  readonly id: string;
  private config: FSMConfig;
  private actions: ActionMap;
  private guards: GuardMap;

  /** Current top-level state ID */
  private _state: string;
  /** Current child state ID (if nested) */
  private _child: string | null = null;
  /** Seconds since the current top-level state was entered */
  private _timeInState = 0;
  /** Seconds since the current child state was entered */
  private _timeInChild = 0;
  private _after: PendingAfter | null = null;

  /** Callback fired on every transition (for debugging) */
  onTransition?: (state: string, child: string | null) => void;

  constructor(config: FSMConfig, actions: ActionMap = {}, guards: GuardMap = {}) {
    if (!config.states[config.initial]) {
      throw new Error(`[CombatFSM] "${config.id}" has no initial state "${config.initial}"`);
    }
    this.id = config.id;
    this.config = config;
    this.actions = actions;
    this.guards = guards;
    this._state = config.initial;
    this.enterRoot(this._state, 'init');
  }

  // ── Public API ─────────────────────────────────────────────────

  /** Current state value, e.g. 'attacking' or 'attacking.combo' */
  get value(): string {
    return this._child ? `${this._state}.${this._child}` : this._state;
  }

  get state(): string {
    return this._state;
  }

  get child(): string | null {
    return this._child;
  }

  /** Seconds spent in the current top-level state */
  get timeInState(): number {
    return this._timeInState;
  }

  /** Seconds spent in the current child state (0 when not nested) */
  get timeInChild(): number {
    return this._child ? this._timeInChild : 0;
  }

  /** Check if current state matches the given name (supports nested: 'attacking.light') */
  matches(name: string): boolean {
    if (name === this._state) return true;
    return this._child !== null && name === `${this._state}.${this._child}`;
  }

  /** Check if current state (or its active child) has the given tag */
  hasTag(tag: string): boolean {
    const node = this.getNode(this._state);
    if (!node) return false;
    if (node.tags?.includes(tag)) return true;
    const childNode = this.getChildNode();
    return childNode?.tags?.includes(tag) ?? false;
  }

  /** Whether `event` would be taken right now (guards evaluated) */
  can(event: string, payload?: FSMPayload): boolean {
    return this.findTransition(event, payload) !== null;
  }

  /** Send an event; returns true when a transition was taken */
  send(event: string, payload?: FSMPayload): boolean {
    const transition = this.findTransition(event, payload);
    if (!transition) return false; // unhandled: ignored
    this.transitionTo(transition, event, payload);
    return true;
  }

  /** Advance state timers and fire any `after` transition that is due */
  update(dt: number): void {
    const step = Math.max(0, dt);
    this._timeInState += step;
    if (this._child) this._timeInChild += step;

    const pending = this._after;
    if (!pending) return;
    const elapsed = pending.child ? this._timeInChild : this._timeInState;
    if (elapsed >= pending.delay) {
      this._after = null;
      this.transitionTo({ target: pending.target }, 'after');
    }
  }

  /** Force-reset to a specific state without running exit actions */
  reset(stateId?: string): void {
    const target = stateId ?? this.config.initial;
    if (!this.getNode(target)) {
      throw new Error(`[CombatFSM] "${this.id}" cannot reset to unknown state "${target}"`);
    }
    this._state = target;
    this._child = null;
    this.enterRoot(target, 'reset');
    this.onTransition?.(this._state, this._child);
  }

  // ── Internal ───────────────────────────────────────────────────

  private findTransition(event: string, payload?: FSMPayload): TransitionDef | null {
    // Child transitions are more specific than the parent's
    const candidates = [this.getChildNode(), this.getNode(this._state)];
    for (const node of candidates) {
      const raw = node?.on?.[event];
      if (raw === undefined) continue;
      const def: TransitionDef = typeof raw === 'string' ? { target: raw } : raw;
      if (def.cond) {
        const guard = this.guards[def.cond];
        if (guard && !guard(payload)) return null;
      }
      return def;
    }
    return null;
  }

  private transitionTo(def: TransitionDef, event: string, payload?: FSMPayload): void {
    const resolved = resolveTarget(def.target);
    const oldNode = this.getNode(this._state);
    const oldChildNode = this.getChildNode();
    const isNewRoot = resolved.root !== this._state;

    if (oldChildNode) this.fire(oldChildNode.exit, event, payload);
    if (isNewRoot && oldNode) this.fire(oldNode.exit, event, payload);

    this.fire(def.actions, event, payload);

    if (isNewRoot || resolved.child === undefined) {
      // Enter (or re-enter) the root
      this._state = resolved.root;
      this._child = null;
      this.enterRoot(resolved.root, event, payload, resolved.child);
    } else {
      this.enterChild(resolved.child, event, payload);
    }

    this.onTransition?.(this._state, this._child);
  }

  private enterRoot(stateId: string, event: string, payload?: FSMPayload, child?: string): void {
    const node = this.getNode(stateId);
    this._timeInState = 0;
    this._timeInChild = 0;
    this._after = null;
    if (!node) {
      console.warn(`[CombatFSM] "${this.id}" entered unknown state "${stateId}"`);
      return;
    }

    this.fire(node.entry, event, payload);
    this.armAfter(node, false);

    const childId = child ?? node.initial;
    if (childId !== undefined && node.states?.[childId]) {
      this.enterChild(childId, event, payload);
    }
  }

  private enterChild(childId: string, event: string, payload?: FSMPayload): void {
    const parent = this.getNode(this._state);
    const node = parent?.states?.[childId];
    if (!node) return;

    this._child = childId;
    this._timeInChild = 0;
    if (this._after?.child) this._after = null;
    this.fire(node.entry, event, payload);
    // A child's timer takes over from the parent's
    if (node.after) this.armAfter(node, true);
  }

  private armAfter(node: StateNode, child: boolean): void {
    const after = firstAfter(node);
    if (after) this._after = { ...after, child };
  }

  private getNode(stateId: string): StateNode | undefined {
    return this.config.states[stateId];
  }

  private getChildNode(): StateNode | undefined {
    if (!this._child) return undefined;
    return this.getNode(this._state)?.states?.[this._child];
  }

  private fire(names: string | string[] | undefined, event: string, payload?: FSMPayload): void {
    for (const name of toList(names)) {
      this.actions[name]?.(event, payload);
    }
  }
}
