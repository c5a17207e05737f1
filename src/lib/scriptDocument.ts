import { z } from 'zod';
import type { ScriptDocument, TemplateData } from './models';

const DURATION_TOLERANCE_SECONDS = 30;

export const scriptSectionSchema = z.object({
  id: z.string().trim().min(1),
  type: z.string().trim().min(1),
  content: z.string().trim().min(1),
  duration_seconds: z.number().int().min(1),
  metadata: z.record(z.unknown()).optional(),
});

export const scriptDocumentSchema = z
  .object({
    title: z.string().trim().min(1),
    total_duration_seconds: z.number().int().positive(),
    sections: z.array(scriptSectionSchema).min(1, 'Script must have at least one section'),
    metadata: z.record(z.unknown()).default({}),
  })
  .refine(
    (script) => {
      const sum = script.sections.reduce((total, section) => total + section.duration_seconds, 0);
      return Math.abs(script.total_duration_seconds - sum) <= DURATION_TOLERANCE_SECONDS;
    },
    { message: 'Total duration does not match sum of section durations', path: ['total_duration_seconds'] },
  );

export const templateDataSchema = z.object({
  sections: z
    .array(
      z.object({
        type: z.string().min(1),
        duration: z.number().positive(),
        template: z.string(),
      }),
    )
    .min(1),
  total_duration: z.number().positive().optional(),
  voice_settings: z.record(z.unknown()).optional(),
});

export function parseTemplateData(value: unknown): TemplateData | null {
  const parsed = templateDataSchema.safeParse(value);
  return parsed.success ? parsed.data : null;
}

/** Plain narration text handed to speech synthesis. */
export function scriptToNarration(script: ScriptDocument): string {
  return script.sections
    .map((section) => section.content.trim())
    .filter(Boolean)
    .join('\n\n');
}
