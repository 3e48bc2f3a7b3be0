/**
 * Sentiment Type Definitions
 */

import type { Utterance } from './transcript.js';

/**
 * Emotion categories counted by the lexicon scorer
 */
export const EMOTIONS = [
  'anger',
  'anticipation',
  'disgust',
  'fear',
  'joy',
  'sadness',
  'surprise',
  'trust',
] as const;

export type Emotion = (typeof EMOTIONS)[number];

export type EmotionCounts = Record<Emotion, number>;

/**
 * Lexicon scores for one piece of text
 */
export interface SentimentScore {
  /** Sum of AFINN valences (-5..+5 per word) */
  score: number;
  /** score divided by token count */
  comparative: number;
  tokenCount: number;
  positiveWords: string[];
  negativeWords: string[];
  emotions: EmotionCounts;
}

/**
 * An utterance together with its scores
 */
export interface ScoredUtterance extends Utterance {
  sentiment: SentimentScore;
}

/**
 * Anything that can score a piece of text
 */
export interface SentimentScorer {
  score(text: string): SentimentScore;
}

export function emptyEmotionCounts(): EmotionCounts {
  return {
    anger: 0,
    anticipation: 0,
    disgust: 0,
    fear: 0,
    joy: 0,
    sadness: 0,
    surprise: 0,
    trust: 0,
  };
}
