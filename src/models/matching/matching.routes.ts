import { Router } from 'express';
import { createUpload } from '../../middleware/upload.middleware';
import { DocumentExtractor } from '../../utils/textParser';
import { MatcherService } from './matcher.service';
import { MatchingController } from './matching.controller';

export interface MatchingRouteOptions {
  maxTopK: number;
  maxUploadBytes: number;
}

export function createMatchingRoutes(
  extractor: DocumentExtractor,
  matcher: MatcherService,
  options: MatchingRouteOptions
): Router {
  const router = Router();
  const controller = new MatchingController(extractor, matcher, options.maxTopK);
  const upload = createUpload(options.maxUploadBytes);

  // POST /upload-cv - Extract and summarize a CV
  router.post('/upload-cv', upload.single('file'), controller.uploadCv.bind(controller));

  // POST /upload-cv-and-match - Summarize, match and analyze in one request
  router.post('/upload-cv-and-match', upload.single('file'), controller.uploadCvAndMatch.bind(controller));

  // POST /match-jobs - Match raw CV text
  router.post('/match-jobs', controller.matchJobs.bind(controller));

  return router;
}
