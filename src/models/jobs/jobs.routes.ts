import { Router } from 'express';
import { createUpload } from '../../middleware/upload.middleware';
import { JobIngestionService } from './jobIngestion.service';
import { JobStore } from './jobStore';
import { JobsController } from './jobs.controller';

export function createJobRoutes(ingestion: JobIngestionService, store: JobStore, maxUploadBytes: number): Router {
  const router = Router();
  const controller = new JobsController(ingestion, store);
  const upload = createUpload(maxUploadBytes);

  // POST /add-job - Add or replace a single posting
  router.post('/add-job', controller.addJob.bind(controller));

  // POST /add-jobs - JSON batch, or a CSV / JSON file in the "file" field
  router.post('/add-jobs', upload.single('file'), controller.addJobs.bind(controller));

  // POST /add-sample-jobs - Seed the store with the bundled postings
  router.post('/add-sample-jobs', controller.addSampleJobs.bind(controller));

  router.get('/collection-stats', controller.collectionStats.bind(controller));
  router.get('/jobs/:id', controller.getJob.bind(controller));
  router.delete('/jobs/:id', controller.deleteJob.bind(controller));

  return router;
}
