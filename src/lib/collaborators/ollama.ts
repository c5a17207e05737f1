import { z } from 'zod';
import type { ScriptDocument } from '../models';
import { PipelineError } from '../pipelineErrors';
import { scriptDocumentSchema } from '../scriptDocument';
import { joinUrl, probeHealth, requestJson } from './http';
import type { CollaboratorHealth, HealthProbe, ScriptGenerator, ScriptRequest } from './types';

const generateResponseSchema = z.object({
  model: z.string().optional(),
  response: z.string(),
  done: z.boolean().optional(),
});

const STYLE_DIRECTIONS: Record<ScriptRequest['style'], string> = {
  educational: 'Explain clearly for a curious beginner, building from fundamentals to examples.',
  news: 'Report concisely and neutrally, leading with the most important facts.',
  entertainment: 'Keep the tone lively and playful while staying on topic.',
  podcast: 'Write as a relaxed conversational monologue for a podcast host.',
  tutorial: 'Walk through concrete steps the listener can follow along with.',
  interview: 'Structure the script as questions and answers between a host and a guest.',
};

export function buildScriptPrompt(request: ScriptRequest): string {
  const totalSeconds = request.durationMinutes * 60;
  const lines = [
    `Write a narration script titled "${request.title}".`,
    request.description ? `Topic summary: ${request.description}` : '',
    STYLE_DIRECTIONS[request.style],
    `Target length: ${request.durationMinutes} minutes (${totalSeconds} seconds).`,
  ];
  if (request.template) {
    lines.push('Follow this section outline (type, seconds, opening line):');
    for (const section of request.template.sections) {
      lines.push(`- ${section.type}, ${section.duration}s: ${section.template.replace(/\{topic\}/g, request.title)}`);
    }
  }
  lines.push(
    'Respond with JSON only, shaped as',
    '{"title": string, "total_duration_seconds": number, "sections": [{"id": string, "type": string, "content": string, "duration_seconds": number}], "metadata": {}}.',
    'total_duration_seconds must equal the sum of the section durations.',
  );
  return lines.filter(Boolean).join('\n');
}

export function parseScriptResponse(raw: string): ScriptDocument {
  let candidate: unknown;
  try {
    candidate = JSON.parse(raw);
  } catch {
    throw new PipelineError('transient-unavailable', 'ollama returned a script that is not valid JSON', {
      service: 'ollama',
      responsePreview: raw.slice(0, 200),
    });
  }
  const parsed = scriptDocumentSchema.safeParse(candidate);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new PipelineError(
      'transient-unavailable',
      `ollama returned an invalid script: ${issue ? `${issue.path.join('.') || 'script'}: ${issue.message}` : 'invalid shape'}`,
      { service: 'ollama' },
    );
  }
  return parsed.data;
}

export class OllamaScriptGenerator implements ScriptGenerator, HealthProbe {
  readonly name = 'ollama';

  constructor(private readonly host: string) {}

  async generateScript(request: ScriptRequest, signal: AbortSignal): Promise<ScriptDocument> {
    const result = await requestJson({
      service: this.name,
      url: joinUrl(this.host, '/api/generate'),
      body: {
        model: request.model,
        prompt: buildScriptPrompt(request),
        stream: false,
        format: 'json',
        options: { temperature: 0.7 },
      },
      schema: generateResponseSchema,
      signal,
    });
    const script = parseScriptResponse(result.response);
    return {
      ...script,
      metadata: { ...script.metadata, model: result.model || request.model, style: request.style },
    };
  }

  checkHealth(signal?: AbortSignal): Promise<CollaboratorHealth> {
    return probeHealth(this.name, joinUrl(this.host, '/api/tags'), signal);
  }
}
