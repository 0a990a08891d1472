/**
 * Converts SubRip text to WebVTT.
 *
 * Each cue keeps its timing line (commas become dots) and the lines after it;
 * cue numbers and blocks without a timing line are dropped.
 */
export function srtToVtt(srt: string): string {
  let vtt = 'WEBVTT\n\n';

  for (const rawBlock of srt.replace(/\r\n/g, '\n').split('\n\n')) {
    const block = rawBlock.trim();
    if (!block) {
      continue;
    }

    const lines = block.split('\n');
    const timingAt = lines.findIndex((line) => line.includes('-->'));
    if (timingAt === -1) {
      continue;
    }

    vtt += lines[timingAt].replace(/,/g, '.') + '\n';
    for (const line of lines.slice(timingAt + 1)) {
      vtt += line + '\n';
    }
    vtt += '\n';
  }

  return vtt;
}
