export { Rect } from './Rect.js';

export { EasingKind, applyEasing, clamp01, easeInOutQuad, easeInOutCubic } from './Easing.js';
