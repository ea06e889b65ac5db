import { Request, Response, NextFunction } from 'express';
import { chatRequestSchema, JobContextDto } from '../../interfaces/dto/ChatRequestDto';
import { JobContextItem } from '../../interfaces/domain/ChatTurn';
import { parseOrThrow } from '../../utils/validation';
import { AdvisorService } from './advisor.service';

function toJobContextItem(dto: JobContextDto): JobContextItem {
  return {
    title: dto.job_title,
    company: dto.company,
    matchScore: dto.match_score,
    requiredSkills: dto.required_skills,
    experienceLevel: dto.experience_level,
    location: dto.location
  };
}

export class AdvisorController {
  constructor(private readonly advisor: AdvisorService) {}

  async chat(req: Request, res: Response, next: NextFunction) {
    try {
      const dto = parseOrThrow(chatRequestSchema, req.body, 'Invalid chat request');

      const response = await this.advisor.reply({
        message: dto.message,
        history: dto.chat_history,
        jobContext: dto.job_context?.map(toJobContextItem)
      });

      res.json({ response, timestamp: new Date().toISOString() });
    } catch (error) {
      next(error);
    }
  }
}
