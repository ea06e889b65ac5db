import { z } from 'zod';

export const chatTurnSchema = z.object({
  role: z.enum(['user', 'assistant']),
  content: z.string().max(20000)
});

export const jobContextSchema = z.object({
  job_title: z.string().max(300),
  company: z.string().max(300).optional(),
  match_score: z.number().min(0).max(100).optional(),
  required_skills: z.string().max(2000).optional(),
  experience_level: z.string().max(100).optional(),
  location: z.string().max(300).optional()
});

export const chatRequestSchema = z.object({
  message: z.string().trim().min(1, 'Message cannot be empty').max(4000),
  chat_history: z.array(chatTurnSchema).max(200).optional().default([]),
  job_context: z.array(jobContextSchema).max(20).optional()
});

export type ChatTurnDto = z.infer<typeof chatTurnSchema>;
export type JobContextDto = z.infer<typeof jobContextSchema>;
export type ChatRequestDto = z.infer<typeof chatRequestSchema>;
