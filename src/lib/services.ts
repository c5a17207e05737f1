import { createHttpCollaborators } from '../worker/pipeline';
import type { HealthProbe } from './collaborators/types';
import { readPipelineConfig } from './config';
import { createEpisodeService, type EpisodeService } from './episodeService';
import { createLogger } from './log';
import { createPgEpisodeStore } from './repos/episodes';
import { createPgGenerationLogStore } from './repos/generationLogs';
import { createPgTemplateStore } from './repos/templates';

let episodeService: EpisodeService | null = null;
let healthProbes: HealthProbe[] | null = null;

/**
 * Service wired to PostgreSQL for the route handlers. No dispatcher is attached:
 * the worker process picks up new drafts on its next poll.
 */
export function getEpisodeService(): EpisodeService {
  if (!episodeService) {
    const config = readPipelineConfig();
    episodeService = createEpisodeService({
      store: createPgEpisodeStore(),
      logs: createPgGenerationLogStore(),
      templates: createPgTemplateStore(),
      defaults: {
        targetDurationMinutes: config.defaultTargetDurationMinutes,
        voiceSpeed: config.collaborators.ttsVoiceSpeed,
      },
      logger: createLogger({ level: config.logLevel, base: { component: 'api' } }),
    });
  }
  return episodeService;
}

export function getHealthProbes(): HealthProbe[] {
  if (!healthProbes) {
    healthProbes = createHttpCollaborators(readPipelineConfig()).probes;
  }
  return healthProbes;
}
