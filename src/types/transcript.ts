/**
 * Transcript Type Definitions
 *
 * Line-level and utterance-level shapes used by the attribution pipeline.
 */

/**
 * Speaker name reserved for non-debaters (moderator, audience, captions)
 */
export const OTHER_SPEAKER = 'Other';

/**
 * One line of extracted document text
 */
export interface RawLine {
  /** Zero-based position in the source document */
  readonly lineIndex: number;
  readonly text: string;
}

/**
 * A raw line after the attribution pass
 */
export interface AttributedLine {
  lineIndex: number;
  /** Trimmed line text */
  text: string;
  /** Canonical speaker, or null before the first label line */
  speaker: string | null;
  /** True when the line is itself a speaker label */
  isLabel: boolean;
  /** True for empty lines and lines matching a noise pattern */
  isNoise: boolean;
  /** Raw turn counter value, or null before the first label line */
  turnId: number | null;
}

/**
 * A speaker turn: the unit of analysis
 */
export interface Utterance {
  /** Dense chronological index starting at 1 */
  turnId: number;
  speaker: string;
  text: string;
}

/**
 * Counts of lines dropped during grouping, by reason
 */
export interface AttributionStats {
  totalLines: number;
  noiseLines: number;
  labelLines: number;
  preambleLines: number;
  otherSpeakerLines: number;
  emptyTurns: number;
  utterances: number;
}
