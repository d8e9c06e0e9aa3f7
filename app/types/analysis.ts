/**
 * Analysis - request and response bodies of the NLP endpoints
 *
 * Field names are snake_case on the wire.
 */

import type { Emotion } from './emotion';
import type { CrisisSeverity } from './crisis-severity';

/** Body of POST /analyze_mood, /detect_crisis and /summarize */
export interface TextInput {
  text: string;
}

export interface MoodResponse {
  emotion: Emotion;

  /** 0-1 */
  confidence: number;
}

export interface CrisisResponse {
  crisis_detected: boolean;
  severity: CrisisSeverity;

  /** 0-1 */
  confidence: number;
}

export interface SummaryResponse {
  summary: string;
}

export interface ErrorResponse {
  error: string;
  details?: unknown[];
}
