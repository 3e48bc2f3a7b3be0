/**
 * Analysis Type Definitions
 */

import type { EmotionCounts, ScoredUtterance } from './sentiment.js';
import type { AttributionStats } from './transcript.js';

export interface DescriptiveStats {
  min: number;
  max: number;
  mean: number;
  median: number;
}

/**
 * Aggregate scores for one speaker
 */
export interface SpeakerSummary {
  speaker: string;
  utteranceCount: number;
  wordCount: number;
  score: DescriptiveStats;
  comparative: DescriptiveStats;
  emotions: EmotionCounts;
}

export interface TimelinePoint {
  turnId: number;
  score: number;
  comparative: number;
  /** Trailing mean of comparative over this speaker's recent utterances */
  rollingMean: number;
}

/**
 * Chart-ready sentiment series, one per speaker
 */
export interface SpeakerTimeline {
  speaker: string;
  points: TimelinePoint[];
}

export type RankingMetric = 'score' | 'comparative';

export interface UtteranceRanking {
  metric: RankingMetric;
  mostPositive: ScoredUtterance[];
  mostNegative: ScoredUtterance[];
}

export type AnalysisSourceType = 'text' | 'url' | 'file';

export interface AnalysisMeta {
  analysisId: string;
  generatedAt: string;
  source: { type: AnalysisSourceType; location?: string; title?: string };
  profileName: string;
  rollingWindow: number;
  attribution: AttributionStats;
}

/**
 * Complete result of one analysis run
 */
export interface TranscriptAnalysis {
  meta: AnalysisMeta;
  utterances: ScoredUtterance[];
  speakers: SpeakerSummary[];
  timelines: SpeakerTimeline[];
  ranking: UtteranceRanking;
}
