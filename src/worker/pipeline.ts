import type { PipelineConfig } from '../lib/config';
import { HttpMediaAssembler } from '../lib/collaborators/mediaPipeline';
import { OllamaScriptGenerator } from '../lib/collaborators/ollama';
import { HttpSpeechSynthesizer } from '../lib/collaborators/speech';
import type { HealthProbe, MediaAssembler, ScriptGenerator, SpeechSynthesizer } from '../lib/collaborators/types';
import type { MediaStore } from '../lib/media';
import type { TemplateStore } from '../lib/stores';
import { AudioStage } from './stages/audioStage';
import { ScriptStage } from './stages/scriptStage';
import type { StageExecutor } from './stages/types';
import { VideoStage } from './stages/videoStage';

export type Collaborators = {
  generator: ScriptGenerator;
  synthesizer: SpeechSynthesizer;
  assembler: MediaAssembler;
  probes: HealthProbe[];
};

export function createHttpCollaborators(config: PipelineConfig): Collaborators {
  const { collaborators } = config;
  const generator = new OllamaScriptGenerator(collaborators.ollamaHost);
  const synthesizer = new HttpSpeechSynthesizer(collaborators.ttsServiceUrl);
  const assembler = new HttpMediaAssembler(collaborators.mediaPipelineUrl);
  return { generator, synthesizer, assembler, probes: [generator, synthesizer, assembler] };
}

/** Script, audio, video: the order is the status order of the state machine. */
export function createStageExecutors(
  config: PipelineConfig,
  deps: {
    generator: ScriptGenerator;
    synthesizer: SpeechSynthesizer;
    assembler: MediaAssembler;
    templates: TemplateStore;
    media: MediaStore;
  },
): StageExecutor[] {
  const { collaborators, stageTimeoutMs } = config;
  return [
    new ScriptStage(
      { generator: deps.generator, templates: deps.templates, media: deps.media },
      { model: collaborators.ollamaModel, timeoutMs: stageTimeoutMs.script },
    ),
    new AudioStage(
      { synthesizer: deps.synthesizer },
      {
        model: collaborators.ttsModel,
        voiceSpeed: collaborators.ttsVoiceSpeed,
        sampleRate: collaborators.ttsSampleRate,
        format: collaborators.audioFormat,
        bitrate: collaborators.audioBitrate,
        timeoutMs: stageTimeoutMs.audio,
      },
    ),
    new VideoStage(
      { assembler: deps.assembler },
      {
        resolution: collaborators.videoResolution,
        fps: collaborators.videoFps,
        codec: collaborators.videoCodec,
        quality: collaborators.videoQuality,
        timeoutMs: stageTimeoutMs.video,
      },
    ),
  ];
}
