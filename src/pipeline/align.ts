import type { DiarizationInterval, Segment, SpeakerMap, Transcript } from './types';

export function overlapSec(seg: Segment, d: DiarizationInterval): number {
    return Math.max(0, Math.min(seg.endSec, d.endSec) - Math.max(seg.startSec, d.startSec));
}

function center(startSec: number, endSec: number): number {
    return (startSec + endSec) / 2;
}

function byMaxOverlap(seg: Segment, intervals: DiarizationInterval[]): string | undefined {
    let best: DiarizationInterval | undefined;
    let bestOverlap = 0;
    for (const d of intervals) {
        const o = overlapSec(seg, d);
        if (o <= 0) continue;
        // Exact ties go to the earlier interval, then the lower label
        if (
            !best ||
            o > bestOverlap ||
            (o === bestOverlap &&
                (d.startSec < best.startSec || (d.startSec === best.startSec && d.speaker < best.speaker)))
        ) {
            best = d;
            bestOverlap = o;
        }
    }
    return best?.speaker;
}

function byNearestCenter(seg: Segment, intervals: DiarizationInterval[]): string | undefined {
    const c = center(seg.startSec, seg.endSec);
    let bestDist = Infinity;
    let speakers = new Set<string>();
    for (const d of intervals) {
        const dist = Math.abs(center(d.startSec, d.endSec) - c);
        if (dist < bestDist) {
            bestDist = dist;
            speakers = new Set([d.speaker]);
        } else if (dist === bestDist) {
            speakers.add(d.speaker);
        }
    }
    // Equidistant turns from different speakers leave the segment unlabeled
    return speakers.size === 1 ? [...speakers][0] : undefined;
}

/**
 * Label each segment with the speaker of the diarization turn it overlaps
 * most, or, inside a diarization gap, of the turn whose center is nearest.
 * Segments are labeled independently, so input order never changes a label.
 */
export function assignSpeakers(transcript: Transcript, intervals: DiarizationInterval[]): Transcript {
    if (intervals.length === 0) return transcript.map((s) => ({ ...s }));
    return transcript.map((seg) => {
        const speaker = byMaxOverlap(seg, intervals) ?? byNearestCenter(seg, intervals);
        const { speaker: _previous, ...rest } = seg;
        return speaker === undefined ? rest : { ...rest, speaker };
    });
}

/**
 * Display names for raw labels; labels missing from the map stay as they are.
 */
export function renameSpeakers(transcript: Transcript, speakerMap: SpeakerMap): Transcript {
    return transcript.map((seg) => {
        if (seg.speaker === undefined || !Object.hasOwn(speakerMap, seg.speaker)) return { ...seg };
        const name = speakerMap[seg.speaker].trim();
        return name ? { ...seg, speaker: name } : { ...seg };
    });
}

export function listSpeakers(transcript: Transcript): string[] {
    const labels = new Set<string>();
    for (const seg of transcript) {
        if (seg.speaker !== undefined) labels.add(seg.speaker);
    }
    return [...labels].sort();
}

export function detectSpeakerCount(transcript: Transcript): number {
    return listSpeakers(transcript).length;
}

export function hasMultipleSpeakers(transcript: Transcript): boolean {
    return detectSpeakerCount(transcript) >= 2;
}
