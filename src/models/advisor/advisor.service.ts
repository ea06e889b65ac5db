import { ChatTurn, JobContextItem } from '../../interfaces/domain/ChatTurn';
import { LlmError, describeError } from '../../utils/errorHandler';
import { LlmClient, LlmMessage } from '../../utils/llmClient';
import { logger } from '../../utils/logger';

const JOB_CONTEXT_LIMIT = 5;

const ADVISOR_SYSTEM_PROMPT = `You are an AI career advisor. You help job seekers with career advice, CV improvements and job matching guidance.
Be helpful and professional, and give concrete, actionable advice.
If the question is unrelated to careers, jobs or professional development, politely steer the conversation back.`;

export interface AdvisorOptions {
  maxHistoryTurns: number;
  maxHistoryChars: number;
  maxTokens: number;
}

export interface AdvisorRequest {
  message: string;
  history: ChatTurn[];
  jobContext?: JobContextItem[];
}

/**
 * Keeps the newest turns that fit both budgets. Older turns go first; a turn
 * that does not fit ends the window, so the kept history is always contiguous.
 */
export function boundHistory(history: ChatTurn[], maxTurns: number, maxChars: number): ChatTurn[] {
  const kept: ChatTurn[] = [];
  let chars = 0;

  for (let i = history.length - 1; i >= 0 && kept.length < maxTurns; i--) {
    const turn = history[i];
    if (chars + turn.content.length > maxChars) {
      break;
    }
    chars += turn.content.length;
    kept.push(turn);
  }

  return kept.reverse();
}

export function formatJobContext(jobs: JobContextItem[]): string {
  return jobs
    .slice(0, JOB_CONTEXT_LIMIT)
    .map((job, i) => {
      const parts = [`${i + 1}. ${job.title}`];
      if (job.company) parts.push(`at ${job.company}`);
      if (job.matchScore !== undefined) parts.push(`(${job.matchScore}% match)`);
      const details = [
        job.requiredSkills ? `skills: ${job.requiredSkills}` : '',
        job.experienceLevel ? `level: ${job.experienceLevel}` : '',
        job.location ? `location: ${job.location}` : ''
      ].filter(Boolean);
      return details.length > 0 ? `${parts.join(' ')}; ${details.join('; ')}` : parts.join(' ');
    })
    .join('\n');
}

/**
 * Stateless career advisor. The client resends the whole conversation on
 * every call; nothing is stored server-side.
 */
export class AdvisorService {
  constructor(
    private readonly llm: LlmClient,
    private readonly options: AdvisorOptions
  ) {}

  async reply(request: AdvisorRequest): Promise<string> {
    const history = boundHistory(request.history, this.options.maxHistoryTurns, this.options.maxHistoryChars);

    let systemPrompt = ADVISOR_SYSTEM_PROMPT;
    if (request.jobContext && request.jobContext.length > 0) {
      systemPrompt += `\n\nThe user's current job matches:\n${formatJobContext(request.jobContext)}`;
    }

    const messages: LlmMessage[] = [
      { role: 'system', content: systemPrompt },
      ...history,
      { role: 'user', content: request.message }
    ];

    if (history.length < request.history.length) {
      logger.info('Trimmed chat history', { received: request.history.length, kept: history.length });
    }

    try {
      return await this.llm.complete({
        purpose: 'chat',
        messages,
        maxTokens: this.options.maxTokens,
        temperature: 0.7
      });
    } catch (error) {
      logger.warn('Advisor reply failed', { error: describeError(error) });
      throw new LlmError('The career advisor is unavailable right now, please try again later');
    }
  }
}
