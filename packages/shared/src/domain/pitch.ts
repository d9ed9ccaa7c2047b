// Pitch dimensions (in meters)
export const PITCH_LENGTH = 105;
export const PITCH_WIDTH = 68;
export const HALF_PITCH_LENGTH = PITCH_LENGTH / 2;

// Penalty area & six-yard box (in meters)
export const BOX_LENGTH = 16.5;
export const BOX_WIDTH = 40.32;
export const SIX_YARD_LENGTH = 5.5;
export const SIX_YARD_WIDTH = 18.32;
export const PENALTY_SPOT_DISTANCE = 11;
