// ═══════════════════════════════════════════════════════════════════
// AUDIO SINK
// Fire-and-forget sound trigger boundary. Playback lives elsewhere;
// the combat core only names the cue and its volume.
// ═══════════════════════════════════════════════════════════════════

export interface AudioSink {
  play(id: string, volume?: number): void;
}

/** Cue identifiers fired by the ability component */
export const AUDIO_CUES = {
  lightAttack:      'attack_light',
  comboAttack:      'attack_combo',
  dashAttack:       'attack_dash',
  ultimateCharge:   'ultimate_charge',
  ultimateExecute:  'ultimate_execute',
  ultimateComplete: 'ultimate_complete',
} as const;

export type AudioCue = typeof AUDIO_CUES[keyof typeof AUDIO_CUES];

export const silentAudio: AudioSink = {
  play: () => {},
};
