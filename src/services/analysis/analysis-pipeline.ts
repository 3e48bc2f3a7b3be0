/**
 * Analysis Pipeline
 *
 * acquire -> attribute -> score -> summarize for one transcript.
 */

import { v4 as uuidv4 } from 'uuid';
import type { CompiledSpeakerProfile } from '../../config/speaker-profile.js';
import type {
  AnalysisMeta,
  RankingMetric,
  TranscriptAnalysis,
} from '../../types/analysis.js';
import type { SentimentScorer } from '../../types/sentiment.js';
import { createAnalysisLogger } from '../logging/logger.js';
import { loggers } from '../logging/log-helpers.js';
import { createLexiconScorer, scoreUtterances } from '../sentiment/lexicon-scorer.js';
import {
  createTranscriptFetcher,
  readTranscriptFile,
  type FetchedTranscript,
  type TranscriptFetcher,
} from '../source/transcript-fetcher.js';
import {
  attributeTranscriptWithStats,
  splitLines,
} from '../transcript/transcript-attributor.js';
import {
  DEFAULT_ROLLING_WINDOW,
  buildSentimentTimeline,
  rankUtterances,
  summarizeBySpeaker,
} from './speaker-statistics.js';

export interface AnalysisOptions {
  profile: CompiledSpeakerProfile;
  /** Rolling mean window, in utterances */
  window?: number;
  /** How many extreme utterances to keep on each side */
  rankingLimit?: number;
  rankBy?: RankingMetric;
  /** Narrow downloaded pages to their main article body */
  extractMainContent?: boolean;
}

export interface AnalysisPipelineDeps {
  fetcher?: TranscriptFetcher;
  scorer?: SentimentScorer;
}

export class AnalysisPipeline {
  private fetcher: TranscriptFetcher;
  private scorer: SentimentScorer;

  constructor(deps: AnalysisPipelineDeps = {}) {
    this.fetcher = deps.fetcher ?? createTranscriptFetcher();
    this.scorer = deps.scorer ?? createLexiconScorer();
  }

  /**
   * Analyze transcript text that is already in memory
   */
  analyzeText(
    text: string,
    options: AnalysisOptions,
    source: AnalysisMeta['source'] = { type: 'text' }
  ): TranscriptAnalysis {
    const analysisId = uuidv4();
    const log = createAnalysisLogger(analysisId);
    const window = options.window ?? DEFAULT_ROLLING_WINDOW;

    log.info({ source, profile: options.profile.name }, 'Starting transcript analysis');

    let stageStart = Date.now();
    const lines = splitLines(text);
    const { utterances, stats } = attributeTranscriptWithStats(lines, options.profile);
    loggers.pipelineStage(analysisId, 'attribute', {
      durationMs: Date.now() - stageStart,
      inputCount: lines.length,
      outputCount: utterances.length,
    });

    if (utterances.length === 0) {
      log.warn({ totalLines: stats.totalLines }, 'No speaker turns found in transcript');
    }

    stageStart = Date.now();
    const scored = scoreUtterances(utterances, this.scorer);
    loggers.pipelineStage(analysisId, 'score', {
      durationMs: Date.now() - stageStart,
      inputCount: utterances.length,
      outputCount: scored.length,
    });

    stageStart = Date.now();
    const speakers = summarizeBySpeaker(scored);
    const timelines = buildSentimentTimeline(scored, { window });
    const ranking = rankUtterances(scored, {
      limit: options.rankingLimit,
      by: options.rankBy,
    });
    loggers.pipelineStage(analysisId, 'summarize', {
      durationMs: Date.now() - stageStart,
      inputCount: scored.length,
      outputCount: speakers.length,
    });

    return {
      meta: {
        analysisId,
        generatedAt: new Date().toISOString(),
        source,
        profileName: options.profile.name,
        rollingWindow: window,
        attribution: stats,
      },
      utterances: scored,
      speakers,
      timelines,
      ranking,
    };
  }

  /**
   * Download a transcript page and analyze it
   */
  async analyzeUrl(url: string, options: AnalysisOptions): Promise<TranscriptAnalysis> {
    const fetched = await this.fetcher.fetchTranscript(url, {
      extractMainContent: options.extractMainContent,
    });
    return this.analyzeFetched('url', fetched, options);
  }

  /**
   * Read a transcript file (.txt or .html) and analyze it
   */
  async analyzeFile(filePath: string, options: AnalysisOptions): Promise<TranscriptAnalysis> {
    const fetched = await readTranscriptFile(filePath);
    return this.analyzeFetched('file', fetched, options);
  }

  private analyzeFetched(
    type: 'url' | 'file',
    fetched: FetchedTranscript,
    options: AnalysisOptions
  ): TranscriptAnalysis {
    return this.analyzeText(fetched.text, options, {
      type,
      location: fetched.source,
      title: fetched.title,
    });
  }
}

export function createAnalysisPipeline(deps?: AnalysisPipelineDeps): AnalysisPipeline {
  return new AnalysisPipeline(deps);
}
