import * as dotenv from 'dotenv';
import type { ChunkFailurePolicy } from './types';
dotenv.config();

function flag(value: string | undefined, fallback = 'false'): boolean {
    return ['1', 'true', 'yes', 'on'].includes((value || fallback).toLowerCase());
}

export type AsrEngine = 'openai' | 'whisperx';

function asrEngine(value: string | undefined): AsrEngine {
    return value === 'whisperx' ? 'whisperx' : 'openai';
}

function chunkFailurePolicy(value: string | undefined): ChunkFailurePolicy {
    return value === 'mark' ? 'mark' : 'fail';
}

export const ENV = {
    chunkSec: Number(process.env.CHUNK_SEC || 30),
    overlapSec: Number(process.env.OVERLAP_SEC || 0.3),
    // Near-duplicate window when resolving segments recognized twice in a chunk overlap
    dedupeEpsilonSec: Number(process.env.DEDUPE_EPSILON_SEC || 0.5),
    asrEngine: asrEngine(process.env.ASR_ENGINE),
    asrModel: process.env.ASR_MODEL || 'whisper-1',
    // Empty lets the engine detect the language
    asrLanguage: process.env.ASR_LANGUAGE || '',
    asrConcurrency: Number(process.env.ASR_CONCURRENCY || 3) || 3,
    asrTimeoutSec: Number(process.env.ASR_TIMEOUT_SEC || 120),
    openaiApiKey: process.env.OPENAI_API_KEY || '',
    openaiBaseUrl: process.env.OPENAI_BASE_URL || '',
    transcribeRetries: Number(process.env.TRANSCRIBE_RETRIES || 1),
    transcribeRetryBaseMs: Number(process.env.TRANSCRIBE_RETRY_BASE_MS || 1000),
    onChunkFailure: chunkFailurePolicy(process.env.ON_CHUNK_FAILURE),
    // Optional: image for whisperx runner (ASR_ENGINE=whisperx)
    whisperxImage: process.env.WHISPERX_IMAGE || '',
    dockerBin: process.env.DOCKER_BIN || 'docker',
    // Optional: extra docker run args (space-separated), e.g. "--device /dev/kfd --device /dev/dri"
    dockerAdditionalArgs: process.env.DOCKER_ADDITIONAL_ARGS || '',
    // Diarization runs either a container image or a local command that prints JSON turns
    diarizeImage: process.env.DIARIZE_IMAGE || '',
    diarizeCommand: process.env.DIARIZE_COMMAND || '',
    diarizeForceCpu: flag(process.env.DIARIZE_FORCE_CPU),
    hfToken: process.env.HF_TOKEN || process.env.HUGGINGFACE_TOKEN || '',
    ffmpegBin: process.env.FFMPEG_BIN || 'ffmpeg',
    ffprobeBin: process.env.FFPROBE_BIN || 'ffprobe',
};
