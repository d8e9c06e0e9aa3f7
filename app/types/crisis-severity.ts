/**
 * Crisis Severity - how urgently a text needs attention
 *
 * Values:
 * - none: No crisis indicators
 * - low: Mild distress, general sadness
 * - moderate: Concerning language, needs attention
 * - high: Clear crisis indicators, immediate attention needed
 */
export const CRISIS_SEVERITIES = ['none', 'low', 'moderate', 'high'] as const;

export type CrisisSeverity = (typeof CRISIS_SEVERITIES)[number];
