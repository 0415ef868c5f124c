import type { ContentBlock, FormattedDocument, SectionKind } from "../schemas/index.js";

const EXTRA_BLANK_LINES = /\n{3,}/g;
const SCORE_PHRASE = /(\w+\s+score:?\s*\d+(?:\.\d+)?(?:\/\d+)?)/gi;
const COMPLEXITY_LEVEL = /(complexity:?\s*(?:low|medium|high)\b)/gi;
const RISK_LEVEL = /\b(LOW|MEDIUM|HIGH|CRITICAL)\b/g;
const INLINE_CODE = /(`[^`\n]*`)/;

/** Apply `transform` to the parts of `text` that are not inline-code spans. */
function outsideInlineCode(text: string, transform: (part: string) => string): string {
  return text
    .split(INLINE_CODE)
    .map((part, index) => (index % 2 === 1 ? part : transform(part)))
    .join("");
}

/**
 * Light Markdown emphasis for display.
 * Analysis output gets its scores and complexity levels set in inline code
 * and upper-case risk levels in bold.
 */
export function emphasize(text: string, kind: SectionKind): string {
  let result = text.replace(EXTRA_BLANK_LINES, "\n\n");

  if (kind === "Analysis") {
    result = outsideInlineCode(result, (part) => part.replace(SCORE_PHRASE, "`$1`"));
    result = outsideInlineCode(result, (part) => part.replace(COMPLEXITY_LEVEL, "`$1`"));
    result = outsideInlineCode(result, (part) => part.replace(RISK_LEVEL, "**$1**"));
  }

  return result;
}

/** Wrap code in a backtick fence longer than any backtick run inside it. */
export function highlightCode(code: string, language = "xml"): string {
  const runs: string[] = code.match(/`+/g) ?? [];
  const longest = runs.reduce((max, run) => Math.max(max, run.length), 0);
  const fence = "`".repeat(Math.max(3, longest + 1));
  return `${fence}${language}\n${code}\n${fence}`;
}

function renderBlock(block: ContentBlock, kind: SectionKind): string {
  return block.type === "code"
    ? highlightCode(block.content, block.language ?? "")
    : emphasize(block.content, kind);
}

/** Render a formatted document back to Markdown, one `##` heading per section. */
export function renderMarkdown(document: FormattedDocument): string {
  return document.sections
    .map((section) => {
      const heading = `## ${section.title}`;
      if (section.blocks.length === 0) return heading;
      const body = section.blocks.map((block) => renderBlock(block, document.kind)).join("\n\n");
      return `${heading}\n\n${body}`;
    })
    .join("\n\n");
}
