/**
 * Speaker Statistics
 *
 * Per-speaker summaries, rolling sentiment series and extreme utterances
 * computed from scored utterances.
 */

import {
  EMOTIONS,
  emptyEmotionCounts,
  type ScoredUtterance,
} from '../../types/sentiment.js';
import type {
  DescriptiveStats,
  RankingMetric,
  SpeakerSummary,
  SpeakerTimeline,
  UtteranceRanking,
} from '../../types/analysis.js';

export const DEFAULT_ROLLING_WINDOW = 5;

/**
 * min / max / mean / median of a non-empty list
 */
export function summarizeValues(values: readonly number[]): DescriptiveStats {
  if (values.length === 0) {
    throw new RangeError('Cannot describe an empty list of values');
  }

  const sorted = [...values].sort((a, b) => a - b);
  const sum = sorted.reduce((acc, value) => acc + value, 0);
  const mid = Math.floor(sorted.length / 2);
  const median =
    sorted.length % 2 === 0
      ? ((sorted[mid - 1] ?? 0) + (sorted[mid] ?? 0)) / 2
      : (sorted[mid] ?? 0);

  return {
    min: sorted[0] ?? 0,
    max: sorted[sorted.length - 1] ?? 0,
    mean: sum / sorted.length,
    median,
  };
}

function groupBySpeaker(scored: readonly ScoredUtterance[]): Map<string, ScoredUtterance[]> {
  const groups = new Map<string, ScoredUtterance[]>();
  for (const utterance of scored) {
    const list = groups.get(utterance.speaker);
    if (list) list.push(utterance);
    else groups.set(utterance.speaker, [utterance]);
  }
  return groups;
}

function countWords(text: string): number {
  const trimmed = text.trim();
  return trimmed ? trimmed.split(/\s+/).length : 0;
}

/**
 * Summaries per speaker, in order of first appearance
 */
export function summarizeBySpeaker(scored: readonly ScoredUtterance[]): SpeakerSummary[] {
  return Array.from(groupBySpeaker(scored), ([speaker, utterances]) => {
    const emotions = emptyEmotionCounts();
    for (const utterance of utterances) {
      for (const emotion of EMOTIONS) {
        emotions[emotion] += utterance.sentiment.emotions[emotion];
      }
    }

    return {
      speaker,
      utteranceCount: utterances.length,
      wordCount: utterances.reduce((acc, u) => acc + countWords(u.text), 0),
      score: summarizeValues(utterances.map((u) => u.sentiment.score)),
      comparative: summarizeValues(utterances.map((u) => u.sentiment.comparative)),
      emotions,
    };
  });
}

/**
 * Sentiment over time for each speaker with a trailing rolling mean
 */
export function buildSentimentTimeline(
  scored: readonly ScoredUtterance[],
  options: { window?: number } = {}
): SpeakerTimeline[] {
  const window = Math.max(1, Math.floor(options.window ?? DEFAULT_ROLLING_WINDOW));

  return Array.from(groupBySpeaker(scored), ([speaker, utterances]) => {
    const ordered = [...utterances].sort((a, b) => a.turnId - b.turnId);
    const points = ordered.map((utterance, i) => {
      const recent = ordered.slice(Math.max(0, i - window + 1), i + 1);
      const rollingMean =
        recent.reduce((acc, u) => acc + u.sentiment.comparative, 0) / recent.length;
      return {
        turnId: utterance.turnId,
        score: utterance.sentiment.score,
        comparative: utterance.sentiment.comparative,
        rollingMean,
      };
    });
    return { speaker, points };
  });
}

/**
 * Most positive and most negative utterances; ties go to the earlier turn
 */
export function rankUtterances(
  scored: readonly ScoredUtterance[],
  options: { limit?: number; by?: RankingMetric } = {}
): UtteranceRanking {
  const metric = options.by ?? 'score';
  const limit = Math.max(0, options.limit ?? 3);
  const value = (u: ScoredUtterance) => u.sentiment[metric];

  const positive = scored
    .filter((u) => value(u) > 0)
    .sort((a, b) => value(b) - value(a) || a.turnId - b.turnId);
  const negative = scored
    .filter((u) => value(u) < 0)
    .sort((a, b) => value(a) - value(b) || a.turnId - b.turnId);

  return {
    metric,
    mostPositive: positive.slice(0, limit),
    mostNegative: negative.slice(0, limit),
  };
}
