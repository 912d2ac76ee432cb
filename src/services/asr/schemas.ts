import { z } from 'zod';

export const WorkerSegmentSchema = z
  .object({
    text: z.string(),
    start: z.number().finite().min(0),
    end: z.number().finite().min(0)
  })
  .refine((segment) => segment.end >= segment.start, {
    message: 'segment end must not precede its start'
  });

export const TranscribeResultSchema = z.object({
  segments: z.array(WorkerSegmentSchema),
  language: z.string().optional(),
  durationSeconds: z.number().optional()
});

export const WarmupResultSchema = z
  .object({
    model: z.string().optional(),
    loadSeconds: z.number().optional()
  })
  .passthrough();

export const formatIssues = (error: z.ZodError): string =>
  error.errors.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
