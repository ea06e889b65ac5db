import { Request, Response, NextFunction } from 'express';
import { addJobsBodySchema, toJobPostingView } from '../../interfaces/dto/JobRecordDto';
import { uploadedFile } from '../../middleware/upload.middleware';
import { NotFoundError } from '../../utils/errorHandler';
import { parseOrThrow } from '../../utils/validation';
import { IngestionReport, JobIngestionService } from './jobIngestion.service';
import { JobStore } from './jobStore';

function toReportView(report: IngestionReport) {
  return {
    inserted_count: report.insertedCount,
    failed_count: report.failedCount,
    results: report.results
  };
}

export class JobsController {
  constructor(
    private readonly ingestion: JobIngestionService,
    private readonly store: JobStore
  ) {}

  async addJob(req: Request, res: Response, next: NextFunction) {
    try {
      const result = await this.ingestion.addJob(req.body);
      res.status(201).json({ id: result.id, created: result.created });
    } catch (error) {
      next(error);
    }
  }

  async addJobs(req: Request, res: Response, next: NextFunction) {
    try {
      const file = uploadedFile(req);
      const report = file
        ? await this.ingestion.importFile(file)
        : await this.ingestion.addJobs(parseOrThrow(addJobsBodySchema, req.body, 'Invalid jobs payload'));

      res.json(toReportView(report));
    } catch (error) {
      next(error);
    }
  }

  async addSampleJobs(req: Request, res: Response, next: NextFunction) {
    try {
      const report = await this.ingestion.addSampleJobs();
      res.json(toReportView(report));
    } catch (error) {
      next(error);
    }
  }

  async getJob(req: Request, res: Response, next: NextFunction) {
    try {
      const { id } = req.params;
      const job = await this.store.get(id);
      if (!job) {
        throw new NotFoundError(`Job ${id} not found`);
      }
      res.json(toJobPostingView(job));
    } catch (error) {
      next(error);
    }
  }

  async deleteJob(req: Request, res: Response, next: NextFunction) {
    try {
      const { id } = req.params;
      const removed = await this.store.remove(id);
      if (!removed) {
        throw new NotFoundError(`Job ${id} not found`);
      }
      res.status(204).end();
    } catch (error) {
      next(error);
    }
  }

  async collectionStats(req: Request, res: Response, next: NextFunction) {
    try {
      const stats = await this.store.stats();
      res.json({ collection_name: stats.collectionName, row_count: stats.rowCount });
    } catch (error) {
      next(error);
    }
  }
}
