/**
 * Lexicon Sentiment Scorer
 *
 * Valence comes from the AFINN-165 word list bundled with the `sentiment`
 * package; emotion counts come from a word -> emotion lexicon shipped in
 * data/emotion-lexicon.json.
 */

import Sentiment from 'sentiment';
import { z } from 'zod';
import defaultEmotionLexicon from '../../../data/emotion-lexicon.json' with { type: 'json' };
import {
  EMOTIONS,
  emptyEmotionCounts,
  type Emotion,
  type SentimentScore,
  type SentimentScorer,
  type ScoredUtterance,
} from '../../types/sentiment.js';
import type { Utterance } from '../../types/transcript.js';

export type EmotionLexicon = Record<Emotion, string[]>;

const emotionLexiconSchema = z.object({
  anger: z.array(z.string()),
  anticipation: z.array(z.string()),
  disgust: z.array(z.string()),
  fear: z.array(z.string()),
  joy: z.array(z.string()),
  sadness: z.array(z.string()),
  surprise: z.array(z.string()),
  trust: z.array(z.string()),
});

export interface LexiconScorerOptions {
  /** Word -> emotions table; defaults to the bundled lexicon */
  emotionLexicon?: EmotionLexicon;
  /** AFINN overrides, e.g. { cuts: -2 } */
  valenceOverrides?: Record<string, number>;
}

/**
 * Fields of a `sentiment` analysis that overrides adjust
 */
interface ValenceResult {
  score: number;
  tokens: string[];
  calculation: Array<Record<string, number>>;
  positive: string[];
  negative: string[];
}

/**
 * Swap the AFINN contribution of overridden words for the override value.
 *
 * `sentiment` merges its `extras` option into a label table shared by every
 * analyzer in the process, so overrides are applied to the result instead.
 * Overridden words are not negated.
 */
export function applyValenceOverrides(
  result: ValenceResult,
  overrides: ReadonlyMap<string, number>
): { score: number; positive: string[]; negative: string[] } {
  let score = result.score;
  for (const entry of result.calculation) {
    for (const [word, contribution] of Object.entries(entry)) {
      if (overrides.has(word)) score -= contribution;
    }
  }

  const positive = result.positive.filter((word) => !overrides.has(word));
  const negative = result.negative.filter((word) => !overrides.has(word));
  for (const token of result.tokens) {
    const valence = overrides.get(token);
    if (valence === undefined) continue;
    score += valence;
    if (valence > 0) positive.push(token);
    if (valence < 0) negative.push(token);
  }

  return { score, positive, negative };
}

/**
 * Lowercased word tokens used for emotion lookup
 */
export function tokenizeWords(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^a-z']+/)
    .map((token) => token.replace(/^'+|'+$/g, ''))
    .filter((token) => token.length > 0);
}

function indexLexicon(lexicon: EmotionLexicon): Map<string, Emotion[]> {
  const parsed = emotionLexiconSchema.parse(lexicon);
  const index = new Map<string, Emotion[]>();
  for (const emotion of EMOTIONS) {
    for (const word of parsed[emotion]) {
      const key = word.toLowerCase();
      const emotions = index.get(key) ?? [];
      if (!emotions.includes(emotion)) emotions.push(emotion);
      index.set(key, emotions);
    }
  }
  return index;
}

export class LexiconSentimentScorer implements SentimentScorer {
  private analyzer = new Sentiment();
  private emotionIndex: Map<string, Emotion[]>;
  private valenceOverrides: Map<string, number>;

  constructor(options: LexiconScorerOptions = {}) {
    this.emotionIndex = indexLexicon(options.emotionLexicon ?? defaultEmotionLexicon);
    this.valenceOverrides = new Map(
      Object.entries(options.valenceOverrides ?? {}).map(([word, valence]): [string, number] => [
        word.toLowerCase(),
        valence,
      ])
    );
  }

  score(text: string): SentimentScore {
    const emotions = emptyEmotionCounts();
    if (text.trim() === '') {
      return { score: 0, comparative: 0, tokenCount: 0, positiveWords: [], negativeWords: [], emotions };
    }

    const result = this.analyzer.analyze(text);
    const valence =
      this.valenceOverrides.size > 0
        ? applyValenceOverrides(result, this.valenceOverrides)
        : { score: result.score, positive: result.positive, negative: result.negative };

    for (const word of tokenizeWords(text)) {
      for (const emotion of this.emotionIndex.get(word) ?? []) {
        emotions[emotion] += 1;
      }
    }

    return {
      score: valence.score,
      comparative: result.tokens.length > 0 ? valence.score / result.tokens.length : 0,
      tokenCount: result.tokens.length,
      positiveWords: valence.positive,
      negativeWords: valence.negative,
      emotions,
    };
  }
}

/**
 * Attach scores to each utterance, preserving order
 */
export function scoreUtterances(
  utterances: readonly Utterance[],
  scorer: SentimentScorer
): ScoredUtterance[] {
  return utterances.map((utterance) => ({
    ...utterance,
    sentiment: scorer.score(utterance.text),
  }));
}

export function createLexiconScorer(options?: LexiconScorerOptions): LexiconSentimentScorer {
  return new LexiconSentimentScorer(options);
}
