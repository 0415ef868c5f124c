import type { Metric } from "../schemas/index.js";

interface MetricRule {
  label: string;
  pattern: RegExp;
  read: (match: RegExpExecArray) => string;
}

const capitalize = (word: string): string =>
  word.charAt(0).toUpperCase() + word.slice(1).toLowerCase();

// Allows an echoed range hint such as "Maintainability score (1-10): 7/10".
const RANGE_HINT = String.raw`(?:\s*\([^)]*\))?`;
const SEPARATOR = String.raw`\s*:?\s*\**\s*`;

const RULES: MetricRule[] = [
  {
    label: "Cyclomatic Complexity",
    pattern: new RegExp(String.raw`cyclomatic\s+complexity(?:\s+score)?${RANGE_HINT}${SEPARATOR}(\d+)`, "i"),
    read: (match) => match[1],
  },
  {
    label: "Maintainability",
    pattern: new RegExp(
      String.raw`maintainability\s+score${RANGE_HINT}${SEPARATOR}(\d+(?:\.\d+)?)(?:\s*\/\s*(\d+))?`,
      "i",
    ),
    read: (match) => (match[2] ? `${match[1]}/${match[2]}` : match[1]),
  },
  {
    label: "Complexity Rating",
    pattern: new RegExp(String.raw`complexity\s+rating${RANGE_HINT}${SEPARATOR}(low|medium|high)\b`, "i"),
    read: (match) => capitalize(match[1]),
  },
  {
    label: "Overall Risk",
    pattern: new RegExp(String.raw`overall\s+risk(?:\s+level)?${SEPARATOR}(low|medium|high|critical)\b`, "i"),
    read: (match) => capitalize(match[1]),
  },
];

/** Pull headline metrics out of an analysis response, in a fixed order. */
export function extractMetrics(rawText: string): Metric[] {
  const metrics: Metric[] = [];
  for (const rule of RULES) {
    const match = rule.pattern.exec(rawText);
    if (match) metrics.push({ label: rule.label, value: rule.read(match) });
  }
  return metrics;
}
