import { toShortRange } from '../timecode';
import type { Segment, Transcript } from '../types';

/**
 * Normalized cue/paragraph text: unified newlines, no blank lines inside.
 * Whitespace-only segments yield an empty string and are not exported.
 */
export function cueText(text: string): string {
    return text
        .replace(/\r\n?/g, '\n')
        .split('\n')
        .map((line) => line.replace(/\s+$/, ''))
        .filter((line) => line.trim().length > 0)
        .join('\n')
        .trim();
}

export function labeled(seg: Segment, text: string): string {
    return seg.speaker ? `${seg.speaker}: ${text}` : text;
}

export interface ExportEntry {
    seg: Segment;
    text: string;
}

export function exportEntries(transcript: Transcript): ExportEntry[] {
    const out: ExportEntry[] = [];
    for (const seg of transcript) {
        const text = cueText(seg.text);
        if (text) out.push({ seg, text });
    }
    return out;
}

export interface DocParagraph {
    speaker?: string;
    range: string;
    text: string;
}

export const DOCUMENT_TITLE = 'Transcription';

export function documentParagraphs(transcript: Transcript): DocParagraph[] {
    return exportEntries(transcript).map(({ seg, text }) => ({
        speaker: seg.speaker,
        range: toShortRange(seg.startSec, seg.endSec),
        text,
    }));
}

// XML 1.0 forbids most C0 controls and unpaired surrogates; WordprocessingML inherits that
const XML_INVALID =
    /[\u0000-\u0008\u000B\u000C\u000E-\u001F\uFFFE\uFFFF]|[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/g;

export function xmlSafe(text: string): string {
    return text.replace(XML_INVALID, '\uFFFD');
}
