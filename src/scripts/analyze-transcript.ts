/**
 * Analyze a debate transcript from the command line
 *
 * Run with:
 *   npx tsx src/scripts/analyze-transcript.ts --file transcript.html --profile profiles/leaders-debate.json
 *   npx tsx src/scripts/analyze-transcript.ts --url https://example.com/debate --out report.md
 */

import { promises as fs } from 'fs';
import { parseArgs } from 'util';
import { appConfig } from '../config/app-config.js';
import { loadSpeakerProfile } from '../config/speaker-profile.js';
import { createAnalysisPipeline } from '../services/analysis/analysis-pipeline.js';
import { createMarkdownExporter } from '../services/export/index.js';
import { createTranscriptFetcher } from '../services/source/transcript-fetcher.js';
import { SpeakerProfileError, TranscriptFetchError } from '../services/validation/errors.js';
import { formatNumber } from '../services/export/markdownExporter.js';
import { loggedOperation } from '../services/logging/log-helpers.js';

const USAGE = `Usage: analyze-transcript (--url <url> | --file <path>) [options]

Options:
  --profile <path>   Speaker profile JSON (default: ${appConfig.speakerProfilePath})
  --out <path>       Write the Markdown report to a file instead of stdout
  --json <path>      Also write the full analysis as JSON
  --window <n>       Rolling mean window in utterances (default: ${appConfig.rollingWindow})
  --main-content     Narrow downloaded pages to the main article body
  --transcript       Include the attributed transcript in the report
  --help             Show this message`;

async function main(): Promise<number> {
  const { values } = parseArgs({
    options: {
      url: { type: 'string' },
      file: { type: 'string' },
      profile: { type: 'string' },
      out: { type: 'string' },
      json: { type: 'string' },
      window: { type: 'string' },
      'main-content': { type: 'boolean', default: false },
      transcript: { type: 'boolean', default: false },
      help: { type: 'boolean', default: false },
    },
  });

  if (values.help) {
    console.log(USAGE);
    return 0;
  }

  if ((values.url === undefined) === (values.file === undefined)) {
    console.error('Error: provide exactly one of --url or --file\n');
    console.error(USAGE);
    return 1;
  }

  const window = values.window !== undefined ? parseInt(values.window, 10) : appConfig.rollingWindow;
  if (!Number.isInteger(window) || window < 1) {
    console.error(`Error: --window must be a positive integer, got "${values.window}"`);
    return 1;
  }

  const profilePath = values.profile ?? appConfig.speakerProfilePath;
  const profile = await loggedOperation('load_profile', () => loadSpeakerProfile(profilePath), {
    profilePath,
  });
  const pipeline = createAnalysisPipeline({
    fetcher: createTranscriptFetcher(appConfig.fetch),
  });
  const options = { profile, window, extractMainContent: values['main-content'] };

  const analysis = values.url !== undefined
    ? await pipeline.analyzeUrl(values.url, options)
    : await pipeline.analyzeFile(values.file ?? '', options);

  const result = createMarkdownExporter().export(analysis, {
    includeTranscript: values.transcript,
  });
  if (!result.success || result.content === undefined) {
    console.error(`Error: report export failed: ${result.error}`);
    return 1;
  }

  if (values.out) {
    await fs.writeFile(values.out, result.content, 'utf-8');
    console.log(`Report written to ${values.out}`);
  } else {
    console.log(result.content);
  }

  if (values.json) {
    await fs.writeFile(values.json, JSON.stringify(analysis, null, 2), 'utf-8');
    console.log(`Analysis written to ${values.json}`);
  }

  for (const speaker of analysis.speakers) {
    console.error(
      `${speaker.speaker}: ${speaker.utteranceCount} turns, mean score ${formatNumber(speaker.score.mean)}`
    );
  }

  return 0;
}

main()
  .then((code) => process.exit(code))
  .catch((error: unknown) => {
    if (error instanceof SpeakerProfileError) {
      console.error(error.getDetailedReport());
    } else if (error instanceof TranscriptFetchError) {
      console.error(`Error: ${error.message}`);
    } else {
      console.error('Unexpected error:', error);
    }
    process.exit(1);
  });
