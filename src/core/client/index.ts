export {
  AssistantClient,
  DEFAULT_CHUNK_SIZE,
  type AssistantClientConfig,
  type AnalysisOptions,
  type RawText,
  type TestCaseOptions,
} from "./assistantClient.js";
