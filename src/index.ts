export { runPipeline } from './pipeline/run';
export type { PipelineDeps, PipelineWarning, RunPipelineOptions, RunPipelineResult } from './pipeline/run';
export { planChunks } from './pipeline/chunk';
export { mergeChunks } from './pipeline/merge';
export { assignSpeakers, detectSpeakerCount, hasMultipleSpeakers, listSpeakers, renameSpeakers } from './pipeline/align';
export { mergeShortAdjacent, probeDevice, ProcessDiarizer } from './pipeline/diarize';
export type { Diarizer, DiarizeRequest } from './pipeline/diarize';
export type { RecognitionRequest, Recognizer } from './pipeline/recognize';
export { FfmpegMediaProbe } from './pipeline/media';
export type { MediaProbe } from './pipeline/media';
export { OpenAIRecognizer, WhisperXRecognizer, withEngines } from './pipeline/engines';
export { EXPORT_FILES, exportAll, parseSrt } from './pipeline/export';
export type { ExportBundle, ExportFailure } from './pipeline/export';
export * from './pipeline/errors';
export * from './pipeline/types';
