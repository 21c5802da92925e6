export { PromptAssembler, type PromptAssemblerOptions, type AssembleOptions } from './assembler.js';
export { formatPromptAsText, DEFAULT_SPEAKER_LABELS, type SpeakerLabels } from './text-format.js';
