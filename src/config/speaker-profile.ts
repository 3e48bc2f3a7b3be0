/**
 * Speaker Profiles
 *
 * A speaker profile tells the attributor which label lines introduce which
 * debater, which labels belong to non-debaters, and which lines are noise.
 * Profiles are plain JSON so the same attributor works across transcripts.
 */

import { promises as fs } from 'fs';
import { z } from 'zod';
import { OTHER_SPEAKER } from '../types/transcript.js';
import { SpeakerProfileError, type ProfileIssue } from '../services/validation/errors.js';
import { loggers } from '../services/logging/log-helpers.js';

/**
 * Noise pattern used when a profile does not list its own: "Page 3"
 */
export const DEFAULT_NOISE_PATTERNS = ['^Page \\d+$'];

const labelSchema = z.string().trim().min(1, 'Label must not be empty');

export const speakerProfileSchema = z.object({
  name: z.string().trim().min(1).default('unnamed'),
  speakers: z
    .array(
      z.object({
        name: z.string().trim().min(1, 'Speaker name must not be empty'),
        labels: z.array(labelSchema).min(1, 'Speaker needs at least one label'),
      })
    )
    .min(1, 'Profile needs at least one speaker'),
  otherLabels: z.array(labelSchema).default([]),
  noisePatterns: z.array(z.string().min(1)).default(DEFAULT_NOISE_PATTERNS),
});

/**
 * Speaker profile as written in JSON (defaults may be omitted)
 */
export type SpeakerProfileConfig = z.input<typeof speakerProfileSchema>;

/**
 * Validated profile with an unambiguous label lookup
 */
export interface CompiledSpeakerProfile {
  readonly name: string;
  /** Canonical debater names, in configuration order */
  readonly speakers: readonly string[];
  /** Exact label text -> canonical speaker (or the "Other" sentinel) */
  readonly labels: ReadonlyMap<string, string>;
  readonly noisePatterns: readonly RegExp[];
}

export interface CompileProfileOptions {
  /**
   * Accept the profile's own noise patterns. Profiles that arrive with a
   * request are compiled with this off and get the default patterns.
   */
  allowNoisePatterns?: boolean;
}

function hasOwnNoisePatterns(input: unknown): boolean {
  return (
    typeof input === 'object' &&
    input !== null &&
    'noisePatterns' in input &&
    input.noisePatterns !== undefined
  );
}

function profileNameOf(input: unknown): string {
  if (typeof input === 'object' && input !== null && 'name' in input) {
    const { name } = input;
    if (typeof name === 'string' && name.trim()) return name.trim();
  }
  return 'unnamed';
}

function fail(profileName: string, issues: ProfileIssue[]): never {
  loggers.profileValidation(
    profileName,
    false,
    issues.map((issue) => `${issue.path}: ${issue.message}`)
  );
  throw new SpeakerProfileError(profileName, issues);
}

/**
 * Validate a profile and build its label lookup.
 *
 * Throws SpeakerProfileError when the profile is malformed, when one label
 * would resolve to two different speakers, when a debater uses the reserved
 * "Other" name, or when a noise pattern is invalid or swallows a label.
 */
export function compileSpeakerProfile(
  input: unknown,
  options: CompileProfileOptions = {}
): CompiledSpeakerProfile {
  const parsed = speakerProfileSchema.safeParse(input);
  if (!parsed.success) {
    fail(
      profileNameOf(input),
      parsed.error.errors.map((err) => ({
        path: err.path.join('.') || '(root)',
        message: err.message,
      }))
    );
  }

  const profile = parsed.data;
  const issues: ProfileIssue[] = [];
  const labels = new Map<string, string>();
  const labelPaths = new Map<string, string>();
  const speakers: string[] = [];

  if (options.allowNoisePatterns === false && hasOwnNoisePatterns(input)) {
    issues.push({
      path: 'noisePatterns',
      message: 'Custom noise patterns are only accepted in server-side profiles',
    });
  }

  const claim = (label: string, speaker: string, path: string) => {
    const existing = labels.get(label);
    if (existing !== undefined && existing !== speaker) {
      issues.push({
        path,
        message: `Label "${label}" maps to both "${existing}" and "${speaker}"`,
      });
      return;
    }
    labels.set(label, speaker);
    if (!labelPaths.has(label)) labelPaths.set(label, path);
  };

  profile.speakers.forEach((speaker, i) => {
    if (speaker.name === OTHER_SPEAKER) {
      issues.push({
        path: `speakers.${i}.name`,
        message: `"${OTHER_SPEAKER}" is reserved for non-debater labels`,
      });
      return;
    }
    if (speakers.includes(speaker.name)) {
      issues.push({
        path: `speakers.${i}.name`,
        message: `Speaker "${speaker.name}" is listed more than once`,
      });
      return;
    }
    speakers.push(speaker.name);
    speaker.labels.forEach((label, j) => claim(label, speaker.name, `speakers.${i}.labels.${j}`));
  });

  profile.otherLabels.forEach((label, i) => claim(label, OTHER_SPEAKER, `otherLabels.${i}`));

  const noisePatterns: RegExp[] = [];
  const patternSources =
    options.allowNoisePatterns === false ? DEFAULT_NOISE_PATTERNS : profile.noisePatterns;
  patternSources.forEach((source, i) => {
    try {
      noisePatterns.push(new RegExp(source));
    } catch (error) {
      issues.push({
        path: `noisePatterns.${i}`,
        message: error instanceof Error ? error.message : `Invalid pattern: ${source}`,
      });
    }
  });

  // A label that is also noise would never open a turn
  for (const [label, path] of labelPaths) {
    const pattern = noisePatterns.find((p) => p.test(label));
    if (pattern) {
      issues.push({
        path,
        message: `Label "${label}" is also matched by noise pattern "${pattern.source}"`,
      });
    }
  }

  if (issues.length > 0) {
    fail(profile.name, issues);
  }

  loggers.profileValidation(profile.name, true);

  return { name: profile.name, speakers, labels, noisePatterns };
}

/**
 * Read and compile a speaker profile from a JSON file
 */
export async function loadSpeakerProfile(filePath: string): Promise<CompiledSpeakerProfile> {
  const raw = await fs.readFile(filePath, 'utf-8');

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    fail(filePath, [
      {
        path: '(root)',
        message: `Not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
      },
    ]);
  }

  return compileSpeakerProfile(data);
}
