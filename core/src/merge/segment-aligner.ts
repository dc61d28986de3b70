import { createRuntimeError, RuntimeErrorCode } from '../errors/index.js';
import type { Logger } from '../logger.js';
import type { AlignedSegment, DurationLookup, RecordingGroup } from '../types.js';

/**
 * Pairs every audio segment of a group with its marker file or a placeholder.
 *
 * The recorder only writes a marker file for a segment in which the button
 * was pressed, and creates it after the segment started. A segment that had
 * finished recording before a marker file was created cannot own it. Marker
 * files and segments are walked once, in name order, under one shared cursor.
 */
export async function alignSegments(
  group: RecordingGroup,
  durationOf: DurationLookup,
  logger: Partial<Logger> = {},
): Promise<AlignedSegment[]> {
  const { audioSegments, markerFiles } = group;
  const aligned: AlignedSegment[] = [];
  let cursor = 0;

  for (const markerFile of markerFiles) {
    let paired = false;
    while (cursor < audioSegments.length && !paired) {
      const segment = audioSegments[cursor];
      cursor += 1;
      const duration = await durationOf(segment);
      const finishedAt = segment.creationTime.getTime() + duration * 1000;
      if (finishedAt < markerFile.creationTime.getTime()) {
        aligned.push({ segment, markers: null });
        logger.debug?.('align.placeholder', { group: group.key, segment: segment.name });
      } else {
        aligned.push({ segment, markers: markerFile });
        paired = true;
        logger.debug?.('align.paired', { group: group.key, segment: segment.name, markers: markerFile.name });
      }
    }
    if (!paired) {
      throw createRuntimeError(
        RuntimeErrorCode.UNMATCHED_MARKER_FILE,
        `Marker file ${markerFile.name} has no audio segment to belong to.`,
        {
          groupKey: group.key,
          filePath: markerFile.path,
          context: `${markerFiles.length} marker file(s) for ${audioSegments.length} audio segment(s)`,
          suggestion: 'Check that every marker file has its audio file next to it and that file times were preserved when copying.',
        },
      );
    }
  }

  for (const segment of audioSegments.slice(cursor)) {
    aligned.push({ segment, markers: null });
  }

  return aligned;
}
