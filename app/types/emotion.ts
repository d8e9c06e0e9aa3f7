/**
 * Emotion - label set for mood analysis
 *
 * Values:
 * - happy, sad, angry, fear, surprise, disgust: basic emotions
 * - neutral: no clear emotional tone
 */
export const EMOTIONS = ['happy', 'sad', 'angry', 'fear', 'surprise', 'disgust', 'neutral'] as const;

export type Emotion = (typeof EMOTIONS)[number];
