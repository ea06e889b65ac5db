import { Router } from 'express';
import { AdvisorController } from './advisor.controller';
import { AdvisorService } from './advisor.service';

export function createAdvisorRoutes(advisor: AdvisorService): Router {
  const router = Router();
  const controller = new AdvisorController(advisor);

  // POST /chat - Stateless career advice; the client sends the history
  router.post('/chat', controller.chat.bind(controller));

  return router;
}
