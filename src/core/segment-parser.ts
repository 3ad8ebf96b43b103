import { createChildLogger } from '../utils/logger.js';

const logger = createChildLogger('segment-parser');

export interface SectionMarker<S extends string> {
  /** Sentinel text; a line containing it switches the parser into `section`. */
  marker: string;
  section: S;
}

export interface SegmentedText<S extends string> {
  sections: Map<S, string[]>;
  /** Sections the parser actually entered, including the initial one. */
  entered: Set<S>;
}

/**
 * Splits one blob of command output into named sections.
 *
 * The parser is a small state machine: it starts in `initial` and moves to a
 * marker's section whenever a line contains that marker. Marker lines are
 * consumed; every other non-blank line is appended as-is to the current
 * section. Nothing is validated or trimmed here, garbled lines are left for
 * the section-specific parser to reject.
 */
export class SegmentParser<S extends string> {
  private readonly markers: ReadonlyArray<SectionMarker<S>>;
  private readonly initial: S;

  constructor(markers: ReadonlyArray<SectionMarker<S>>, initial: S) {
    this.markers = markers;
    this.initial = initial;
  }

  withInitial(initial: S): SegmentParser<S> {
    return new SegmentParser(this.markers, initial);
  }

  parse(text: string): SegmentedText<S> {
    const sections = new Map<S, string[]>();
    const entered = new Set<S>([this.initial]);
    let state: S = this.initial;

    for (const line of text.split(/\r?\n/)) {
      if (line.trim() === '') continue;

      const transition = this.markers.find(m => line.includes(m.marker));
      if (transition) {
        state = transition.section;
        entered.add(state);
        continue;
      }

      const bucket = sections.get(state);
      if (bucket) {
        bucket.push(line);
      } else {
        sections.set(state, [line]);
      }
    }

    logger.trace({
      initial: this.initial,
      entered: [...entered],
      lineCounts: Object.fromEntries([...sections].map(([name, lines]) => [name, lines.length])),
    }, 'Segmented command output');

    return { sections, entered };
  }
}

export function linesOf<S extends string>(segmented: SegmentedText<S>, section: S): string[] {
  return segmented.sections.get(section) ?? [];
}

/** Expected sections whose marker never appeared. */
export function missingSections<S extends string>(segmented: SegmentedText<S>, expected: readonly S[]): S[] {
  return expected.filter(section => !segmented.entered.has(section));
}

export interface PairMarkers {
  outbound: string;
  inbound: string;
}

export const DEFAULT_PAIR_MARKERS: PairMarkers = {
  outbound: '=>',
  inbound: '<=',
};

export interface LinePair {
  outbound: string;
  inbound: string;
}

export interface PairingResult {
  pairs: LinePair[];
  skipped: number;
}

/**
 * Groups paired sampler output: an outbound-marker line immediately followed
 * by its inbound-marker line. A line with neither marker is skipped, an
 * inbound line with nothing pending is an orphan, and an outbound line whose
 * next line is not an inbound line is dropped along with that line. None of
 * these stop the scan.
 */
export function pairFlowLines(lines: readonly string[], markers: PairMarkers = DEFAULT_PAIR_MARKERS): PairingResult {
  const pairs: LinePair[] = [];
  let pending: string | null = null;
  let skipped = 0;

  for (const line of lines) {
    if (line.includes(markers.outbound)) {
      if (pending !== null) skipped++;
      pending = line;
    } else if (line.includes(markers.inbound)) {
      if (pending === null) {
        skipped++;
        continue;
      }
      pairs.push({ outbound: pending, inbound: line });
      pending = null;
    } else {
      if (pending !== null) {
        skipped++;
        pending = null;
      }
      skipped++;
    }
  }

  if (pending !== null) skipped++;

  return { pairs, skipped };
}
