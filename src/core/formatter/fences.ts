const FENCE_OPEN = /^ {0,3}(`{3,}|~{3,})[ \t]*([^`\s]*)/;
const FENCE_CLOSE = /^ {0,3}(`{3,}|~{3,})[ \t]*$/;

export interface Fence {
  char: string;
  size: number;
  language: string;
}

/** Open a fence if `line` starts one. */
export function openFence(line: string): Fence | null {
  const match = FENCE_OPEN.exec(line);
  if (!match) return null;
  const run = match[1];
  return { char: run.charAt(0), size: run.length, language: match[2] };
}

/** A fence closes on a bare run of the same character, at least as long as the opener. */
export function closesFence(line: string, fence: Fence): boolean {
  const match = FENCE_CLOSE.exec(line);
  if (!match) return false;
  const run = match[1];
  return run.charAt(0) === fence.char && run.length >= fence.size;
}

/** The fence still open after the last line of `text`, if any. */
function danglingFence(text: string): Fence | null {
  let fence: Fence | null = null;
  for (const line of text.split(/\r?\n/)) {
    if (fence) {
      if (closesFence(line, fence)) fence = null;
    } else {
      fence = openFence(line);
    }
  }
  return fence;
}

/** Append a closing line when `text` ends inside a fence. */
export function closeDanglingFence(text: string): string {
  const fence = danglingFence(text);
  return fence ? `${text}\n${fence.char.repeat(fence.size)}` : text;
}
