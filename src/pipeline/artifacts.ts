import fs from 'fs-extra';
import path from 'path';
import { z } from 'zod';
import { EXPORT_FILES, type ExportBundle } from './export';
import { info } from './log';
import type { RunPipelineResult } from './run';
import { EXPORT_FORMATS, type ExportFormat, type SpeakerMap, type Transcript } from './types';

const segmentSchema = z.object({
    startSec: z.number(),
    endSec: z.number(),
    text: z.string(),
    speaker: z.string().optional(),
});

const transcriptFileSchema = z.object({
    mediaPath: z.string().optional(),
    durationSec: z.number().optional(),
    segments: z.array(segmentSchema),
});

const speakerMapSchema = z.record(z.string());

export interface TranscriptFile {
    mediaPath?: string;
    durationSec?: number;
    segments: Transcript;
}

export async function writeTranscriptJson(outDir: string, mediaPath: string, result: RunPipelineResult): Promise<string> {
    await fs.ensureDir(outDir);
    const outPath = path.join(outDir, 'transcript.json');
    await fs.writeJson(
        outPath,
        {
            mediaPath,
            durationSec: result.durationSec,
            createdAt: new Date().toISOString(),
            diarization: result.diarization,
            warnings: result.warnings,
            unrecognized: result.unrecognized,
            segments: result.transcript,
        },
        { spaces: 2 }
    );
    return outPath;
}

export async function readTranscriptJson(filePath: string): Promise<TranscriptFile> {
    return transcriptFileSchema.parse(await fs.readJson(filePath));
}

export async function readSpeakerMap(filePath: string): Promise<SpeakerMap> {
    return speakerMapSchema.parse(await fs.readJson(filePath));
}

/**
 * Write each rendered payload under its conventional file name.
 */
export async function writeExports(outDir: string, bundle: ExportBundle): Promise<Partial<Record<ExportFormat, string>>> {
    await fs.ensureDir(outDir);
    const written: Partial<Record<ExportFormat, string>> = {};
    for (const format of EXPORT_FORMATS) {
        const bytes = bundle.files[format];
        if (!bytes) continue;
        const outPath = path.join(outDir, EXPORT_FILES[format].fileName);
        await fs.writeFile(outPath, bytes);
        written[format] = outPath;
    }
    info('export.write', { outDir, files: Object.values(written) });
    return written;
}
