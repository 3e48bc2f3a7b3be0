/**
 * Analysis Routes
 *
 * Express API routes for transcript analysis:
 * - Analyze inline text or a transcript URL
 * - Export an analysis as a Markdown report
 * - Validate a speaker profile
 */

import { Router, type Request, type Response, type NextFunction } from 'express';
import { z } from 'zod';
import {
  compileSpeakerProfile,
  loadSpeakerProfile,
  type CompiledSpeakerProfile,
} from '../config/speaker-profile.js';
import { appConfig } from '../config/app-config.js';
import {
  createAnalysisPipeline,
  type AnalysisOptions,
  type AnalysisPipeline,
} from '../services/analysis/analysis-pipeline.js';
import { createMarkdownExporter, type MarkdownExporter } from '../services/export/index.js';
import { createLogger } from '../services/logging/logger.js';
import { SpeakerProfileError, TranscriptFetchError } from '../services/validation/errors.js';
import type { TranscriptAnalysis } from '../types/analysis.js';

const logger = createLogger({ module: 'analysis-routes' });

const analysisRequestSchema = z
  .object({
    text: z.string().optional(),
    url: z.string().url().optional(),
    profile: z.unknown().optional(),
    window: z.number().int().min(1).max(100).optional(),
    rankingLimit: z.number().int().min(0).max(50).optional(),
    rankBy: z.enum(['score', 'comparative']).optional(),
    extractMainContent: z.boolean().optional(),
  })
  .refine((body) => (body.text === undefined) !== (body.url === undefined), {
    message: 'Provide exactly one of text or url',
    path: ['text'],
  });

const markdownRequestSchema = z.object({
  options: z
    .object({
      includeMetadata: z.boolean().optional(),
      includeSpeakerSummary: z.boolean().optional(),
      includeEmotions: z.boolean().optional(),
      includeExtremes: z.boolean().optional(),
      includeTranscript: z.boolean().optional(),
      maxExcerptLength: z.number().int().min(10).optional(),
    })
    .optional(),
});

type AnalysisRequest = z.infer<typeof analysisRequestSchema>;

export interface AnalysisRouteDeps {
  pipeline?: AnalysisPipeline;
  exporter?: MarkdownExporter;
  /** Profile used when a request does not carry one */
  loadDefaultProfile?: () => Promise<CompiledSpeakerProfile>;
}

function sendValidationError(res: Response, error: z.ZodError): void {
  res.status(400).json({
    success: false,
    error: 'Invalid request',
    code: 'VALIDATION_ERROR',
    details: error.errors,
  });
}

/**
 * Map known failures to JSON responses; pass anything else on
 */
function handleError(error: unknown, res: Response, next: NextFunction): void {
  if (error instanceof SpeakerProfileError) {
    res.status(400).json({
      success: false,
      error: error.message,
      code: 'INVALID_PROFILE',
      details: error.issues,
    });
    return;
  }

  if (error instanceof TranscriptFetchError) {
    logger.warn({ url: error.url, status: error.status }, 'Transcript fetch failed');
    res.status(502).json({
      success: false,
      error: error.message,
      code: 'FETCH_FAILED',
      upstreamStatus: error.status,
    });
    return;
  }

  next(error);
}

/**
 * Create analysis routes
 */
export function createAnalysisRoutes(deps: AnalysisRouteDeps = {}): Router {
  const router = Router();
  const pipeline = deps.pipeline ?? createAnalysisPipeline();
  const exporter = deps.exporter ?? createMarkdownExporter();

  let defaultProfile: Promise<CompiledSpeakerProfile> | null = null;
  const getDefaultProfile = (): Promise<CompiledSpeakerProfile> => {
    if (!defaultProfile) {
      const load = deps.loadDefaultProfile ?? (() => loadSpeakerProfile(appConfig.speakerProfilePath));
      defaultProfile = load().catch((error: unknown) => {
        // Allow a later request to retry after a fixed profile file
        defaultProfile = null;
        throw error;
      });
    }
    return defaultProfile;
  };

  async function runAnalysis(body: AnalysisRequest): Promise<TranscriptAnalysis> {
    const profile =
      body.profile !== undefined
        ? compileSpeakerProfile(body.profile, { allowNoisePatterns: false })
        : await getDefaultProfile();

    const options: AnalysisOptions = {
      profile,
      window: body.window ?? appConfig.rollingWindow,
      rankingLimit: body.rankingLimit,
      rankBy: body.rankBy,
      extractMainContent: body.extractMainContent,
    };

    if (body.url !== undefined) {
      return pipeline.analyzeUrl(body.url, options);
    }
    return pipeline.analyzeText(body.text ?? '', options);
  }

  /**
   * POST /analyses
   * Analyze inline transcript text or a transcript URL
   */
  router.post('/analyses', async (req: Request, res: Response, next: NextFunction) => {
    const parsed = analysisRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      sendValidationError(res, parsed.error);
      return;
    }

    try {
      const analysis = await runAnalysis(parsed.data);
      logger.info(
        { analysisId: analysis.meta.analysisId, utterances: analysis.utterances.length },
        'Analysis completed'
      );
      res.json({ success: true, analysis });
    } catch (error) {
      handleError(error, res, next);
    }
  });

  /**
   * POST /analyses/markdown
   * Analyze and respond with a Markdown report
   */
  router.post('/analyses/markdown', async (req: Request, res: Response, next: NextFunction) => {
    const parsed = analysisRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      sendValidationError(res, parsed.error);
      return;
    }
    const exportOptions = markdownRequestSchema.safeParse(req.body);
    if (!exportOptions.success) {
      sendValidationError(res, exportOptions.error);
      return;
    }

    try {
      const analysis = await runAnalysis(parsed.data);
      const result = exporter.export(analysis, exportOptions.data.options);

      if (!result.success || result.content === undefined) {
        res.status(500).json({ success: false, error: result.error ?? 'Export failed', code: 'EXPORT_FAILED' });
        return;
      }

      res.setHeader('Content-Type', 'text/markdown; charset=utf-8');
      if (result.metadata.fileName) {
        res.setHeader('Content-Disposition', `inline; filename="${result.metadata.fileName}"`);
      }
      res.send(result.content);
    } catch (error) {
      handleError(error, res, next);
    }
  });

  /**
   * POST /profiles/validate
   * Check a speaker profile for structural problems and ambiguous labels
   */
  router.post('/profiles/validate', (req: Request, res: Response, next: NextFunction) => {
    try {
      const profile = compileSpeakerProfile(req.body);
      res.json({
        success: true,
        valid: true,
        profile: {
          name: profile.name,
          speakers: profile.speakers,
          labelCount: profile.labels.size,
          noisePatterns: profile.noisePatterns.map((pattern) => pattern.source),
        },
      });
    } catch (error) {
      handleError(error, res, next);
    }
  });

  return router;
}
