import type { ScriptGenerator } from '../../lib/collaborators/types';
import type { MediaStore } from '../../lib/media';
import type { EpisodeRecord } from '../../lib/models';
import { invalidInput } from '../../lib/pipelineErrors';
import { parseTemplateData } from '../../lib/scriptDocument';
import type { TemplateStore } from '../../lib/stores';
import { withStageTimeout } from './timeout';
import type { StageExecutor, StageOutcome } from './types';

export type ScriptStageConfig = {
  model: string;
  timeoutMs: number;
};

export class ScriptStage implements StageExecutor {
  readonly stage = 'script';
  readonly step = 'script_generation';
  readonly status = 'generating_script';
  readonly timeoutMs: number;

  constructor(
    private readonly deps: { generator: ScriptGenerator; templates: TemplateStore; media: MediaStore },
    private readonly config: ScriptStageConfig,
  ) {
    this.timeoutMs = config.timeoutMs;
  }

  async execute(episode: EpisodeRecord): Promise<StageOutcome> {
    const title = episode.title.trim();
    if (!title) invalidInput('Episode title is required for script generation', { episodeId: episode.id });
    if (!Number.isInteger(episode.target_duration_minutes) || episode.target_duration_minutes <= 0) {
      invalidInput(`Invalid target duration: ${episode.target_duration_minutes}`, { episodeId: episode.id });
    }

    const { template, script, stored } = await withStageTimeout(this.stage, this.timeoutMs, async (signal) => {
      const template = await this.deps.templates.findActiveTemplate(episode.content_style);
      const script = await this.deps.generator.generateScript(
        {
          episodeId: episode.id,
          title,
          description: episode.description?.trim() || '',
          durationMinutes: episode.target_duration_minutes,
          style: episode.content_style,
          template: template ? parseTemplateData(template.template_data) : null,
          model: this.config.model,
        },
        signal,
      );
      const stored = await this.deps.media.put({
        key: `metadata/${episode.id}.json`,
        bytes: Buffer.from(JSON.stringify(script, null, 2), 'utf8'),
      });
      return { template, script, stored };
    });

    return {
      patch: {
        script,
        script_path: stored.path,
      },
      metadata: {
        model: this.config.model,
        templateId: template?.id ?? null,
        sectionCount: script.sections.length,
        totalDurationSeconds: script.total_duration_seconds,
      },
    };
  }
}
