/**
 * Transcript Attributor
 *
 * Turns the flat line sequence of an extracted transcript into speaker
 * turns. Label lines ("DAVID CAMERON:") set the current speaker and open a
 * new turn; every following content line inherits both until the next
 * label. Noise, label lines, non-debater turns and preamble are dropped.
 *
 * All functions are pure: state lives in locals of a single call.
 */

import type { CompiledSpeakerProfile } from '../../config/speaker-profile.js';
import {
  OTHER_SPEAKER,
  type AttributedLine,
  type AttributionStats,
  type RawLine,
  type Utterance,
} from '../../types/transcript.js';

/**
 * Split a text blob into raw lines on \r\n, \n or \r
 */
export function splitLines(text: string): RawLine[] {
  if (text === '') return [];
  return text.split(/\r\n|\n|\r/).map((line, lineIndex) => ({ lineIndex, text: line }));
}

function isNoiseLine(text: string, profile: CompiledSpeakerProfile): boolean {
  if (text === '') return true;
  return profile.noisePatterns.some((pattern) => pattern.test(text));
}

/**
 * Single forward pass: classify each line and forward-fill speaker and turn.
 */
export function attributeLines(
  lines: readonly RawLine[],
  profile: CompiledSpeakerProfile
): AttributedLine[] {
  let currentSpeaker: string | null = null;
  let currentTurn: number | null = null;
  let turnCounter = 0;

  return lines.map((line) => {
    const text = line.text.trim();

    // Noise is classified first so it can never open a turn
    if (isNoiseLine(text, profile)) {
      return {
        lineIndex: line.lineIndex,
        text,
        speaker: currentSpeaker,
        isLabel: false,
        isNoise: true,
        turnId: currentTurn,
      };
    }

    const labelled = profile.labels.get(text);
    if (labelled !== undefined) {
      turnCounter += 1;
      currentSpeaker = labelled;
      currentTurn = turnCounter;
      return {
        lineIndex: line.lineIndex,
        text,
        speaker: currentSpeaker,
        isLabel: true,
        isNoise: false,
        turnId: currentTurn,
      };
    }

    return {
      lineIndex: line.lineIndex,
      text,
      speaker: currentSpeaker,
      isLabel: false,
      isNoise: false,
      turnId: currentTurn,
    };
  });
}

interface TurnGroup {
  speaker: string;
  parts: string[];
}

/**
 * Drop non-content lines, merge each (turn, speaker) group and renumber
 * the surviving turns 1..K.
 */
export function groupUtterances(attributed: readonly AttributedLine[]): Utterance[] {
  return groupWithStats(attributed).utterances;
}

function groupWithStats(attributed: readonly AttributedLine[]): {
  utterances: Utterance[];
  stats: AttributionStats;
} {
  const stats: AttributionStats = {
    totalLines: attributed.length,
    noiseLines: 0,
    labelLines: 0,
    preambleLines: 0,
    otherSpeakerLines: 0,
    emptyTurns: 0,
    utterances: 0,
  };

  // Map preserves first-insertion order, which is document order here
  const groups = new Map<string, TurnGroup>();

  for (const line of attributed) {
    if (line.isNoise) {
      stats.noiseLines += 1;
      continue;
    }
    if (line.isLabel) {
      stats.labelLines += 1;
      continue;
    }
    if (line.speaker === null || line.turnId === null) {
      stats.preambleLines += 1;
      continue;
    }
    if (line.speaker === OTHER_SPEAKER) {
      stats.otherSpeakerLines += 1;
      continue;
    }

    const key = `${line.turnId}\u0000${line.speaker}`;
    const group = groups.get(key);
    if (group) {
      group.parts.push(line.text);
    } else {
      groups.set(key, { speaker: line.speaker, parts: [line.text] });
    }
  }

  const utterances: Utterance[] = [];
  for (const group of groups.values()) {
    utterances.push({
      turnId: utterances.length + 1,
      speaker: group.speaker,
      text: group.parts.join(' '),
    });
  }

  // Label-only turns never reach the group map; count them as empty turns
  const labelTurns = new Set<number>();
  const contentTurns = new Set<number>();
  for (const line of attributed) {
    if (line.turnId === null || line.speaker === OTHER_SPEAKER) continue;
    if (line.isLabel) labelTurns.add(line.turnId);
    else if (!line.isNoise) contentTurns.add(line.turnId);
  }
  for (const turn of labelTurns) {
    if (!contentTurns.has(turn)) stats.emptyTurns += 1;
  }

  stats.utterances = utterances.length;
  return { utterances, stats };
}

/**
 * Attribute a line sequence and group it into utterances
 */
export function attributeTranscript(
  lines: readonly RawLine[],
  profile: CompiledSpeakerProfile
): Utterance[] {
  return groupUtterances(attributeLines(lines, profile));
}

/**
 * Same as attributeTranscript, also reporting why lines were dropped
 */
export function attributeTranscriptWithStats(
  lines: readonly RawLine[],
  profile: CompiledSpeakerProfile
): { utterances: Utterance[]; stats: AttributionStats } {
  return groupWithStats(attributeLines(lines, profile));
}

/**
 * Group already-merged utterances again, one line per utterance.
 * On attributor output this returns an equal sequence.
 */
export function regroupUtterances(utterances: readonly Utterance[]): Utterance[] {
  return groupUtterances(
    utterances.map((utterance, index) => ({
      lineIndex: index,
      text: utterance.text,
      speaker: utterance.speaker,
      isLabel: false,
      isNoise: false,
      turnId: utterance.turnId,
    }))
  );
}
