import type {
  ContentBlock,
  FormattedDocument,
  Section,
  SectionKind,
} from "../schemas/index.js";
import { closesFence, openFence, type Fence } from "./fences.js";

/**
 * Response Formatter – turns free-form AI text into titled sections.
 *
 * Segmentation points, first match wins:
 *   1. ATX headings              "## Overview"
 *   2. Numbered bold headings    "1. **Complexity Metrics**"
 *   3. Whole-line bold           "**Expected Results:**"
 *   4. Test case markers         "Test Case 3: Timeout", "Scenario 2", "TC-004"
 *   5. Label lines               "Preconditions:" at the start of a paragraph
 *
 * Plain list items never segment. Nothing inside a fenced block segments,
 * and an unclosed fence runs to the end of the input.
 */

export const DEFAULT_TITLES: Record<SectionKind, string> = {
  TestCases: "Generated Test Cases",
  Analysis: "Complexity Analysis",
};

const ATX_HEADING = /^ {0,3}#{1,6}[ \t]+(.+?)(?:[ \t]+#+)?[ \t]*$/;
const NUMBERED_BOLD = /^(\d+)([.)])[ \t]*\*\*([^*]+)\*\*[ \t]*(?:([:\-–—])[ \t]*(.*))?$/;
const BOLD_LINE = /^\s*\*\*([^*]+?)\*\*[ \t]*:?[ \t]*$/;
const BOLD_LEAD = /^\*\*([^*]+)\*\*(.*)$/;
const TEST_CASE = /^(?:test[ \t]+case|test[ \t]+scenario|scenario|tc)[ \t#-]*\d+\b/i;
const LIST_ITEM = /^\s*(?:[-*+]|\d+[.)])\s/;
const LABEL = /^\s*(?:\*\*)?([A-Za-z][^:`<*]{0,58}?)(?:\*\*)?[ \t]*:(?:\*\*)?[ \t]*$/;

interface Marker {
  title: string;
  /** Text that followed the marker on its own line; becomes the first body line. */
  remainder?: string;
}

interface Draft {
  title: string;
  lines: string[];
}

/** Drop `**` wrapping the whole of `text`. */
function stripEmphasis(text: string): string {
  const result = text.trim();
  if (result.length > 4 && result.startsWith("**") && result.endsWith("**")) {
    const inner = result.slice(2, -2);
    if (!inner.includes("**")) return inner.trim();
  }
  return result;
}

/** "**Test Case 1:** Valid login" -> "Test Case 1: Valid login" */
function unwrapLead(text: string): string {
  const match = BOLD_LEAD.exec(text);
  return match ? `${match[1]}${match[2]}` : text;
}

function cleanTitle(text: string): string {
  const title = stripEmphasis(text);
  return title.endsWith(":") ? title.slice(0, -1).trimEnd() : title;
}

function detectMarker(line: string, paragraphStart: boolean): Marker | null {
  const heading = ATX_HEADING.exec(line);
  if (heading) {
    const title = cleanTitle(heading[1]);
    return title ? { title } : null;
  }

  const numbered = NUMBERED_BOLD.exec(line);
  if (numbered) {
    const remainder = (numbered[5] ?? "").trim();
    return {
      title: `${numbered[1]}${numbered[2]} ${cleanTitle(numbered[3])}`.trimEnd(),
      remainder: remainder || undefined,
    };
  }

  const bold = BOLD_LINE.exec(line);
  if (bold) {
    const title = cleanTitle(bold[1]);
    return title ? { title } : null;
  }

  const candidate = unwrapLead(stripEmphasis(line));
  if (TEST_CASE.test(candidate)) {
    return { title: cleanTitle(candidate) };
  }

  if (paragraphStart && !LIST_ITEM.test(line)) {
    const label = LABEL.exec(line);
    if (label) return { title: label[1].trim() };
  }

  return null;
}

/**
 * Split a section body into text and code blocks.
 * Fence lines are dropped from code content; an unclosed fence keeps the remainder.
 */
export function splitBlocks(body: string): ContentBlock[] {
  const blocks: ContentBlock[] = [];
  let text: string[] = [];
  let code: string[] = [];
  let fence: Fence | null = null;

  const flushText = () => {
    const content = text.join("\n").trim();
    if (content) blocks.push({ type: "text", content });
    text = [];
  };

  const flushCode = (language: string) => {
    blocks.push({ type: "code", content: code.join("\n"), ...(language ? { language } : {}) });
    code = [];
  };

  for (const line of body.split("\n")) {
    if (fence) {
      if (closesFence(line, fence)) {
        flushCode(fence.language);
        fence = null;
      } else {
        code.push(line);
      }
      continue;
    }

    const opened = openFence(line);
    if (opened) {
      flushText();
      fence = opened;
      continue;
    }

    text.push(line);
  }

  if (fence) flushCode(fence.language);
  flushText();

  return blocks;
}

function toSection(title: string, lines: string[]): Section {
  const body = lines.join("\n").trim();
  return { title, body, blocks: splitBlocks(body) };
}

/**
 * Format a raw AI response into a document of sections.
 * Total over all strings: always returns at least one section.
 */
export function format(rawText: string, kind: SectionKind): FormattedDocument {
  const defaultTitle = DEFAULT_TITLES[kind];
  const lines = rawText.replace(/\r\n?/g, "\n").split("\n");

  const drafts: Draft[] = [];
  let current: Draft = { title: "", lines: [] };
  let fence: Fence | null = null;
  let paragraphStart = true;
  let markerCount = 0;

  for (const line of lines) {
    if (fence) {
      current.lines.push(line);
      if (closesFence(line, fence)) fence = null;
      continue;
    }

    const opened = openFence(line);
    if (opened) {
      fence = opened;
      current.lines.push(line);
      paragraphStart = false;
      continue;
    }

    if (line.trim() === "") {
      current.lines.push(line);
      paragraphStart = true;
      continue;
    }

    const marker = detectMarker(line, paragraphStart);
    paragraphStart = false;

    if (!marker) {
      current.lines.push(line);
      continue;
    }

    markerCount++;
    drafts.push(current);
    current = { title: marker.title, lines: marker.remainder ? [marker.remainder] : [] };
  }
  drafts.push(current);

  if (markerCount === 0) {
    return { kind, sections: [toSection(defaultTitle, lines)] };
  }

  const sections: Section[] = [];
  for (const draft of drafts) {
    const section = toSection(draft.title, draft.lines);
    if (!section.title && !section.body) continue;
    sections.push(section.title ? section : { ...section, title: defaultTitle });
  }

  return {
    kind,
    sections: sections.length > 0 ? sections : [toSection(defaultTitle, lines)],
  };
}
