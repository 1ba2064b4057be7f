import { readFile } from 'node:fs/promises';
import { parse } from 'node:path';
import { logDebug } from '../telemetry/logger.js';
import { getErrorMessage } from '../utils/errors.js';

/**
 * Title of a markdown article: the first `# ` heading, or a title-cased
 * version of the file stem when there is none or the file cannot be read.
 */
export async function readTitle(mdPath: string): Promise<string> {
  let content: string | undefined;
  try {
    content = await readFile(mdPath, 'utf8');
  } catch (error) {
    logDebug('Falling back to file name for title', { mdPath, reason: getErrorMessage(error) });
  }

  if (content !== undefined) {
    const heading = extractHeading(content);
    if (heading !== undefined) return heading;
  }
  return titleFromStem(parse(mdPath).name);
}

export function extractHeading(content: string): string | undefined {
  for (const rawLine of content.split(/\r\n|\r|\n/)) {
    const line = rawLine.trim();
    if (line.startsWith('# ')) {
      return line.slice(2).trim();
    }
  }
  return undefined;
}

/** `rag_pipelines-101` becomes `Rag Pipelines 101`; only first letters change case. */
export function titleFromStem(stem: string): string {
  return stem
    .replace(/[_-]/g, ' ')
    .trim()
    .split(/\s+/)
    .filter((word) => word.length > 0)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(' ');
}
