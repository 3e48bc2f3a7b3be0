/**
 * Export service type definitions
 */

/**
 * Format for exported analyses
 */
export type ExportFormat = 'markdown';

/**
 * Options for Markdown export
 * Allows customization of which sections to include
 */
export interface MarkdownExportOptions {
  /** Include metadata header (source, profile, line counts) */
  includeMetadata?: boolean;

  /** Include the per-speaker sentiment table */
  includeSpeakerSummary?: boolean;

  /** Include the per-speaker emotion table */
  includeEmotions?: boolean;

  /** Include most positive / most negative utterances */
  includeExtremes?: boolean;

  /** Include every attributed utterance with its score */
  includeTranscript?: boolean;

  /** Maximum length of utterance excerpts in the extremes section (characters) */
  maxExcerptLength?: number;
}

/**
 * Metadata for exported files
 */
export interface ExportMetadata {
  /** ID of the analysis run */
  analysisId: string;

  /** Format of the export */
  format: ExportFormat;

  /** When the export was generated */
  generatedAt: string;

  /** Version of the exporter */
  exporterVersion: string;

  /** File size in bytes (for completed exports) */
  fileSizeBytes?: number;

  /** Suggested file name */
  fileName?: string;
}

/**
 * Result of an export operation
 */
export interface ExportResult {
  /** Whether the export was successful */
  success: boolean;

  /** Exported content */
  content?: string;

  /** Export metadata */
  metadata: ExportMetadata;

  /** Error message if export failed */
  error?: string;
}

/**
 * Default Markdown export options
 */
export const DEFAULT_MARKDOWN_OPTIONS: Required<MarkdownExportOptions> = {
  includeMetadata: true,
  includeSpeakerSummary: true,
  includeEmotions: true,
  includeExtremes: true,
  includeTranscript: false,
  maxExcerptLength: 200,
};
