import { renameSpeakers } from '../align';
import { ExportEncodingError, PipelineError, errorMessage } from '../errors';
import { info, warn } from '../log';
import { EXPORT_FORMATS, type ExportFormat, type SpeakerMap, type Transcript } from '../types';
import { renderDocx } from './docx';
import { renderPdf } from './pdf';
import { renderSrt } from './srt';
import { renderText } from './txt';
import { renderVtt } from './vtt';

export type Renderer = (transcript: Transcript) => Promise<Buffer>;

export const RENDERERS: Record<ExportFormat, Renderer> = {
  srt: renderSrt,
  vtt: renderVtt,
  docx: renderDocx,
  pdf: renderPdf,
  txt: renderText,
};

export const EXPORT_FILES: Record<ExportFormat, { fileName: string; mime: string }> = {
  srt: { fileName: 'transcript.srt', mime: 'application/x-subrip' },
  vtt: { fileName: 'transcript.vtt', mime: 'text/vtt' },
  docx: {
    fileName: 'transcript.docx',
    mime: 'application/vnd.openxmlformats-officedocument.wordprocessingml.document',
  },
  pdf: { fileName: 'transcript.pdf', mime: 'application/pdf' },
  txt: { fileName: 'transcript.txt', mime: 'text/plain' },
};

export interface ExportFailure {
  format: ExportFormat;
  error: PipelineError;
}

export interface ExportBundle {
  files: Partial<Record<ExportFormat, Buffer>>;
  failures: ExportFailure[];
}

/**
 * Render every requested format from the same renamed transcript. A format
 * that fails is reported in `failures`; the others are still produced.
 */
export async function exportAll(
  transcript: Transcript,
  speakerMap: SpeakerMap = {},
  formats: readonly ExportFormat[] = EXPORT_FORMATS
): Promise<ExportBundle> {
  const display = renameSpeakers(transcript, speakerMap);
  const settled = await Promise.allSettled(formats.map((format) => RENDERERS[format](display)));
  const bundle: ExportBundle = { files: {}, failures: [] };
  settled.forEach((res, i) => {
    const format = formats[i];
    if (res.status === 'fulfilled') {
      bundle.files[format] = res.value;
      return;
    }
    const error =
      res.reason instanceof PipelineError
        ? res.reason
        : new ExportEncodingError(`${format} export failed: ${errorMessage(res.reason)}`, { format });
    warn('export.fail', { format, error: error.message });
    bundle.failures.push({ format, error });
  });
  info('export.done', { formats: Object.keys(bundle.files), failed: bundle.failures.map((f) => f.format) });
  return bundle;
}

export { composeSrt, parseSrt, renderSrt, type SrtCue } from './srt';
export { composeVtt, renderVtt } from './vtt';
export { composeText, renderText } from './txt';
export { renderDocx } from './docx';
export { renderPdf } from './pdf';
