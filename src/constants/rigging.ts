/**
 * Rig-binding step identifiers, in execution order
 */
export const RIG_STEPS = ['scaleNormalization', 'markerEstimation', 'rigMatching', 'skinBinding'] as const;

export type RigStep = typeof RIG_STEPS[number];
