import type { Report, SectionKind } from "./schemas/index.js";
import { extractMetrics, format, renderMarkdown } from "./formatter/index.js";

/** Everything a shell needs to display one AI answer. */
export function buildReport(kind: SectionKind, model: string, raw: string): Report {
  const document = format(raw, kind);
  return {
    kind,
    model,
    document,
    markdown: renderMarkdown(document),
    metrics: kind === "Analysis" ? extractMetrics(raw) : [],
    raw,
  };
}
