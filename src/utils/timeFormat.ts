/**
 * Time codec. All computation works in integer centiseconds; text only
 * appears at the edges (snapshot files, overrides, reports).
 */

export class TimeFormatError extends Error {
  constructor(public readonly input: string, reason: string) {
    super(`Invalid time format: "${input}" (${reason}), expected MM:SS:CC`);
    this.name = 'TimeFormatError';
  }
}

const FIELD_PATTERN = /^\d+$/;

/**
 * Parse `MM:SS:CC` (or `MM:SS.CC`, the form `formatTime` writes) into
 * centiseconds. Field ranges are not checked.
 */
export function parseTime(text: string): number {
  const fields = text.trim().split(/[:.]/);
  if (fields.length !== 3) {
    throw new TimeFormatError(text, `${fields.length} fields`);
  }

  const [minutes, seconds, centiseconds] = fields.map(field => {
    if (!FIELD_PATTERN.test(field)) {
      throw new TimeFormatError(text, `"${field}" is not a number`);
    }
    return parseInt(field, 10);
  });

  return minutes * 6000 + seconds * 100 + centiseconds;
}

export function formatTime(cs: number): string {
  const minutes = Math.floor(cs / 6000);
  const remainder = cs % 6000;
  const seconds = Math.floor(remainder / 100);
  const centiseconds = remainder % 100;
  return `${pad2(minutes)}:${pad2(seconds)}.${pad2(centiseconds)}`;
}

function pad2(n: number): string {
  return n.toString().padStart(2, '0');
}
