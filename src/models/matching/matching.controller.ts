import { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { matchJobsSchema, toCvSummaryView, toMatchResultView, topKSchema } from '../../interfaces/dto/MatchDto';
import { requireFile } from '../../middleware/upload.middleware';
import { logger } from '../../utils/logger';
import { DocumentExtractor } from '../../utils/textParser';
import { parseOrThrow } from '../../utils/validation';
import { MatcherService } from './matcher.service';

export class MatchingController {
  private readonly matchJobsBody: ReturnType<typeof matchJobsSchema>;
  private readonly uploadOptions: z.ZodObject<{ top_k: ReturnType<typeof topKSchema> }>;

  constructor(
    private readonly extractor: DocumentExtractor,
    private readonly matcher: MatcherService,
    maxTopK: number
  ) {
    this.matchJobsBody = matchJobsSchema(maxTopK);
    this.uploadOptions = z.object({ top_k: topKSchema(maxTopK) });
  }

  async uploadCv(req: Request, res: Response, next: NextFunction) {
    try {
      const file = requireFile(req, 'CV');
      const document = await this.extractor.extract(file);
      const summary = await this.matcher.summarizeCv(document);

      logger.info('CV processed', { format: document.format, chars: document.cleanedText.length });

      res.json({
        filename: file.originalname,
        cv_summary: toCvSummaryView(summary)
      });
    } catch (error) {
      next(error);
    }
  }

  async uploadCvAndMatch(req: Request, res: Response, next: NextFunction) {
    try {
      const file = requireFile(req, 'CV');
      const { top_k: topK } = parseOrThrow(
        this.uploadOptions,
        { top_k: req.body?.top_k ?? req.query.top_k },
        'Invalid top_k'
      );

      const document = await this.extractor.extract(file);
      const result = await this.matcher.analyzeCv(document, { topK });

      res.json({
        matches: result.matches.map(toMatchResultView),
        cv_summary: toCvSummaryView(result.summary),
        analysis: result.analysis,
        rescored: result.rescored
      });
    } catch (error) {
      next(error);
    }
  }

  async matchJobs(req: Request, res: Response, next: NextFunction) {
    try {
      const dto = parseOrThrow(this.matchJobsBody, req.body);
      const outcome = await this.matcher.matchCv(dto.cv_text, { topK: dto.top_k });

      res.json({
        matches: outcome.matches.map(toMatchResultView),
        rescored: outcome.rescored
      });
    } catch (error) {
      next(error);
    }
  }
}
