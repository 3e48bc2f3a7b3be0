/**
 * Markdown Export Service
 *
 * Converts transcript analyses into a readable Markdown report with
 * optional sections: metadata, speaker sentiment table, emotion table,
 * extreme utterances and the full attributed transcript.
 */

import { createLogger } from '../logging/logger.js';
import type { TranscriptAnalysis, SpeakerSummary } from '../../types/analysis.js';
import { EMOTIONS, type ScoredUtterance } from '../../types/sentiment.js';
import type { MarkdownExportOptions, ExportResult, ExportMetadata } from './types.js';
import { DEFAULT_MARKDOWN_OPTIONS } from './types.js';

const logger = createLogger({ module: 'markdown-exporter' });

/**
 * Current version of the Markdown exporter
 */
const EXPORTER_VERSION = '1.0.0';

/**
 * Fixed-point number without a negative zero
 */
export function formatNumber(value: number, digits: number = 2): string {
  const fixed = value.toFixed(digits);
  return /^-0\.?0*$/.test(fixed) ? fixed.slice(1) : fixed;
}

function escapeCell(text: string): string {
  return text.replace(/\|/g, '\\|');
}

function capitalize(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1);
}

/**
 * Markdown Exporter Class
 */
export class MarkdownExporter {
  /**
   * Export an analysis to Markdown
   *
   * @param options - Which sections to include
   */
  export(analysis: TranscriptAnalysis, options: MarkdownExportOptions = {}): ExportResult {
    const analysisId = analysis.meta.analysisId;
    logger.info({ analysisId, options }, 'Starting Markdown export');

    try {
      const opts = { ...DEFAULT_MARKDOWN_OPTIONS, ...options };
      const sections: string[] = [];

      if (opts.includeMetadata) {
        sections.push(this.formatMetadata(analysis));
      }

      if (opts.includeSpeakerSummary) {
        sections.push(this.formatSpeakerSummary(analysis.speakers));
      }

      if (opts.includeEmotions && analysis.speakers.length > 0) {
        sections.push(this.formatEmotions(analysis.speakers));
      }

      if (opts.includeExtremes) {
        sections.push(this.formatExtremes(analysis, opts.maxExcerptLength));
      }

      if (opts.includeTranscript && analysis.utterances.length > 0) {
        sections.push(this.formatTranscript(analysis.utterances));
      }

      // Join sections with horizontal rules
      const content = sections.join('\n\n---\n\n');

      const metadata: ExportMetadata = {
        analysisId,
        format: 'markdown',
        generatedAt: new Date().toISOString(),
        exporterVersion: EXPORTER_VERSION,
        fileSizeBytes: Buffer.byteLength(content, 'utf8'),
        fileName: this.generateFileName(analysis),
      };

      logger.info({ analysisId, sizeBytes: metadata.fileSizeBytes }, 'Markdown export completed');

      return { success: true, content, metadata };
    } catch (error) {
      logger.error({ error, analysisId }, 'Failed to export Markdown');

      return {
        success: false,
        metadata: {
          analysisId,
          format: 'markdown',
          generatedAt: new Date().toISOString(),
          exporterVersion: EXPORTER_VERSION,
        },
        error: error instanceof Error ? error.message : String(error),
      };
    }
  }

  private formatMetadata(analysis: TranscriptAnalysis): string {
    const { meta } = analysis;
    const lines = ['# Debate Sentiment Analysis', ''];

    lines.push(`**Source:** ${meta.source.title || meta.source.location || 'Inline text'}`);
    if (meta.source.location) {
      lines.push(`**Location:** ${meta.source.location}`);
    }
    lines.push(`**Speaker Profile:** ${meta.profileName}`);
    lines.push(`**Analysis ID:** ${meta.analysisId}`);
    lines.push(`**Generated:** ${meta.generatedAt}`);
    lines.push(
      `**Utterances:** ${meta.attribution.utterances} from ${meta.attribution.totalLines} lines`
    );
    lines.push(
      `**Dropped Lines:** ${meta.attribution.noiseLines} noise, ${meta.attribution.labelLines} labels, ` +
        `${meta.attribution.preambleLines} preamble, ${meta.attribution.otherSpeakerLines} non-debater`
    );

    return lines.join('\n');
  }

  private formatSpeakerSummary(speakers: SpeakerSummary[]): string {
    if (speakers.length === 0) {
      return '## Sentiment by Speaker\n\n*No speaker turns were found.*';
    }

    const rows = speakers.map((s) =>
      [
        escapeCell(s.speaker),
        String(s.utteranceCount),
        String(s.wordCount),
        formatNumber(s.score.min),
        formatNumber(s.score.max),
        formatNumber(s.score.mean),
        formatNumber(s.score.median),
        formatNumber(s.comparative.mean, 3),
      ].join(' | ')
    );

    return [
      '## Sentiment by Speaker',
      '',
      '| Speaker | Utterances | Words | Min | Max | Mean | Median | Mean per word |',
      '| --- | ---: | ---: | ---: | ---: | ---: | ---: | ---: |',
      ...rows.map((row) => `| ${row} |`),
    ].join('\n');
  }

  private formatEmotions(speakers: SpeakerSummary[]): string {
    const header = ['Speaker', ...EMOTIONS.map(capitalize)];
    const rows = speakers.map((s) => [
      escapeCell(s.speaker),
      ...EMOTIONS.map((emotion) => String(s.emotions[emotion])),
    ]);

    return [
      '## Emotions by Speaker',
      '',
      `| ${header.join(' | ')} |`,
      `| --- |${EMOTIONS.map(() => ' ---: |').join('')}`,
      ...rows.map((row) => `| ${row.join(' | ')} |`),
    ].join('\n');
  }

  private formatExtremes(analysis: TranscriptAnalysis, maxExcerptLength: number): string {
    const { ranking } = analysis;
    const digits = ranking.metric === 'comparative' ? 3 : 2;

    const list = (utterances: ScoredUtterance[]) =>
      utterances.length === 0
        ? '*None*'
        : utterances
            .map(
              (u, i) =>
                `${i + 1}. **${u.speaker}** (turn ${u.turnId}, ${ranking.metric} ` +
                `${formatNumber(u.sentiment[ranking.metric], digits)}): ${this.excerpt(u.text, maxExcerptLength)}`
            )
            .join('\n');

    return [
      '## Most Positive Utterances',
      '',
      list(ranking.mostPositive),
      '',
      '## Most Negative Utterances',
      '',
      list(ranking.mostNegative),
    ].join('\n');
  }

  private formatTranscript(utterances: ScoredUtterance[]): string {
    const parts: string[] = ['## Attributed Transcript'];

    for (const u of utterances) {
      parts.push(`**[${u.turnId}] ${u.speaker}** (score ${formatNumber(u.sentiment.score)}):\n\n${u.text}`);
    }

    return parts.join('\n\n');
  }

  private excerpt(text: string, maxLength: number): string {
    if (text.length <= maxLength) return text;
    return `${text.substring(0, maxLength).trimEnd()}...`;
  }

  /**
   * Generate a descriptive filename for the export
   */
  private generateFileName(analysis: TranscriptAnalysis): string {
    const date = analysis.meta.generatedAt.split('T')[0];
    const base = (analysis.meta.source.title || analysis.meta.profileName)
      .toLowerCase()
      .replace(/[^a-z0-9]+/g, '-')
      .replace(/^-+|-+$/g, '')
      .substring(0, 50);

    return `sentiment-${base || 'transcript'}-${date}.md`;
  }
}

/**
 * Factory function to create a Markdown exporter
 */
export function createMarkdownExporter(): MarkdownExporter {
  return new MarkdownExporter();
}
