export { format, splitBlocks, DEFAULT_TITLES } from "./responseFormatter.js";
export { emphasize, highlightCode, renderMarkdown } from "./markdown.js";
export { extractMetrics } from "./metrics.js";
