// ═══════════════════════════════════════════════════════════════════
// COMBAT TUNING CONSTANTS
// All durations are seconds, distances are world pixels and speeds
// are pixels per second. Components merge their own overrides over
// these defaults.
// ═══════════════════════════════════════════════════════════════════

// ── Light attacks / combos ────────────────────────────────────────

/** Follow-up window after an attack input that escalates the combo */
export const COMBO_WINDOW = 0.5;

/** Highest combo stage reachable from a light attack */
export const MAX_COMBO_STAGE = 3;

/** Animation lock applied by the opening light attack */
export const LIGHT_ATTACK_LOCK = 0.4;

// ── Ultimate ability ──────────────────────────────────────────────

export const ULTIMATE_CHARGE_TIME = 1.0;
export const ULTIMATE_EXECUTION_TIME = 0.5;
export const ULTIMATE_COOLDOWN = 8.0;
export const ULTIMATE_MANA_COST = 30;
export const ULTIMATE_DASH_SPEED = 2000;
export const ULTIMATE_DAMAGE = 40;
export const ULTIMATE_RANGE = 400;

/** Slow-motion applied while charging */
export const ULTIMATE_CHARGE_TIME_SCALE = 0.3;

/** Deep time dilation applied on release */
export const ULTIMATE_EXECUTE_TIME_SCALE = 0.3;

/** Length of the letterbox/zoom cinematic started on release */
export const ULTIMATE_CINEMATIC_DURATION = 2.0;

/** Charge progress past which the letterbox slides in */
export const ULTIMATE_LETTERBOX_THRESHOLD = 0.5;

// ── Camera ────────────────────────────────────────────────────────

/** Proportional approach rate toward a focus target (per second) */
export const CAMERA_FOCUS_RATE = 5.0;

/** Transition used when a delayed zoom reset kicks in */
export const ZOOM_RESET_DURATION = 0.5;

/** Letterbox bar height as a fraction of the viewport */
export const LETTERBOX_DEFAULT_SIZE = 0.1;
export const LETTERBOX_ULTIMATE_SIZE = 0.15;
export const LETTERBOX_TRANSITION = 0.5;

/** Priority given to the letterbox bars (always drawn last regardless) */
export const LETTERBOX_PRIORITY = 1000;

// ── Animation ─────────────────────────────────────────────────────

/** A run younger than this uses the run-start sprite */
export const RUN_START_WINDOW = 0.2;

/** ...unless the body is already moving faster than this */
export const RUN_START_MAX_SPEED = 400;

/** Player collision box */
export const PLAYER_WIDTH = 40;
export const PLAYER_HEIGHT = 140;
