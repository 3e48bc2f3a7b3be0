/**
 * Error classes shared by the analysis pipeline and routes
 */

/**
 * One problem found in a speaker profile
 */
export interface ProfileIssue {
  path: string;
  message: string;
}

/**
 * Thrown when a speaker profile is malformed or ambiguous
 *
 * Raised at compile time, before any transcript is processed.
 */
export class SpeakerProfileError extends Error {
  public readonly issues: ProfileIssue[];
  public readonly profileName: string;

  constructor(profileName: string, issues: ProfileIssue[]) {
    super(
      `Speaker profile "${profileName}" is invalid: ${SpeakerProfileError.formatIssues(issues)}`
    );
    this.name = 'SpeakerProfileError';
    this.profileName = profileName;
    this.issues = issues;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, SpeakerProfileError);
    }

    Object.setPrototypeOf(this, SpeakerProfileError.prototype);
  }

  private static formatIssues(issues: ProfileIssue[]): string {
    return issues.map((issue) => `${issue.path}: ${issue.message}`).join('; ');
  }

  /**
   * Get a detailed error report
   */
  getDetailedReport(): string {
    const lines = [
      `Speaker Profile "${this.profileName}" Validation Failed`,
      `Total issues: ${this.issues.length}`,
      '',
      'Issues:',
    ];

    this.issues.forEach((issue, index) => {
      lines.push(`  ${index + 1}. Path: ${issue.path}`);
      lines.push(`     Message: ${issue.message}`);
    });

    return lines.join('\n');
  }
}

/**
 * Thrown when a transcript document cannot be downloaded or read
 */
export class TranscriptFetchError extends Error {
  public readonly url: string;
  public readonly status?: number;

  constructor(url: string, message: string, status?: number) {
    super(message);
    this.name = 'TranscriptFetchError';
    this.url = url;
    this.status = status;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, TranscriptFetchError);
    }

    Object.setPrototypeOf(this, TranscriptFetchError.prototype);
  }
}
