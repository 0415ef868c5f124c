import { closeDanglingFence } from "../formatter/fences.js";

/**
 * Split code into parts of at most `maxChars` characters, breaking on line
 * boundaries. A single line longer than `maxChars` is cut into pieces.
 */
export function splitIntoChunks(code: string, maxChars: number): string[] {
  if (maxChars < 1) {
    throw new RangeError(`maxChars must be positive, got ${maxChars}`);
  }
  if (code.length <= maxChars) return [code];

  const chunks: string[] = [];
  let current = "";
  let hasLines = false;

  const flush = () => {
    if (hasLines) chunks.push(current);
    current = "";
    hasLines = false;
  };

  for (const line of code.split("\n")) {
    if (line.length > maxChars) {
      flush();
      for (let start = 0; start < line.length; start += maxChars) {
        chunks.push(line.slice(start, start + maxChars));
      }
      continue;
    }

    const candidate = hasLines ? `${current}\n${line}` : line;
    if (candidate.length > maxChars) {
      flush();
      current = line;
    } else {
      current = candidate;
    }
    hasLines = true;
  }
  flush();

  return chunks;
}

/**
 * Join per-part answers under "## Part i of n" headings.
 * A part cut off inside a code fence gets the fence closed so later parts stay outside it.
 */
export function mergeChunkResults(results: string[]): string {
  if (results.length === 1) return results[0];
  return results
    .map((text, index) => `## Part ${index + 1} of ${results.length}\n\n${closeDanglingFence(text.trim())}`)
    .join("\n\n");
}
