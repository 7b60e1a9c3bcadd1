import { ConfigurationError } from '../errors.js';

export const PipelineStages = {
  PRE_PROCESS: 'pre_process',
  DIFF_DETECTION: 'diff_detection',
  PREPARATION: 'preparation',
  CHUNKING: 'chunking',
  TRANSLATION: 'translation',
  CONSENSUS: 'consensus',
  VALIDATION: 'validation',
  POST_PROCESS: 'post_process',
  OUTPUT: 'output',
} as const;

/** Stages every pipeline has, in this relative order. */
export const ESSENTIAL_STAGES: readonly string[] = [
  PipelineStages.TRANSLATION,
  PipelineStages.VALIDATION,
  PipelineStages.OUTPUT,
];

export const DEFAULT_STAGE_ORDER: readonly string[] = [
  PipelineStages.PRE_PROCESS,
  PipelineStages.DIFF_DETECTION,
  PipelineStages.PREPARATION,
  PipelineStages.CHUNKING,
  PipelineStages.TRANSLATION,
  PipelineStages.CONSENSUS,
  PipelineStages.VALIDATION,
  PipelineStages.POST_PROCESS,
  PipelineStages.OUTPUT,
];

export function validateStageOrder(stages: readonly string[]): readonly string[] {
  const seen = new Set<string>();
  for (const stage of stages) {
    if (stage.trim() === '') {
      throw new ConfigurationError('Stage names must not be empty');
    }
    if (seen.has(stage)) {
      throw new ConfigurationError(`Stage '${stage}' is listed more than once`);
    }
    seen.add(stage);
  }

  const positions = ESSENTIAL_STAGES.map((stage) => stages.indexOf(stage));
  const missing = ESSENTIAL_STAGES.filter((_, index) => positions[index] === -1);
  if (missing.length > 0) {
    throw new ConfigurationError(`Stage order is missing required stages: ${missing.join(', ')}`);
  }
  for (let i = 1; i < positions.length; i++) {
    if (positions[i] < positions[i - 1]) {
      throw new ConfigurationError(`Stage order must keep ${ESSENTIAL_STAGES.join(' < ')}`);
    }
  }

  return Object.freeze([...stages]);
}
