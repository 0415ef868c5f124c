import { z } from "zod";

// ── Models ────────────────────────────────────────────────────────────
export const SUPPORTED_MODELS = [
  "llama-3.3-70b-versatile",
  "llama-3.1-70b-versatile",
  "llama-3.1-8b-instant",
  "mixtral-8x7b-32768",
] as const;
export const DEFAULT_MODEL = SUPPORTED_MODELS[0];

export const ModelSchema = z.enum(SUPPORTED_MODELS);
export type Model = z.infer<typeof ModelSchema>;

// ── Test case generation options ──────────────────────────────────────
export const TestTypeSchema = z.enum([
  "Happy Path Tests",
  "Edge Cases",
  "Error Scenarios",
  "Boundary Value Tests",
  "Integration Tests",
  "Performance Tests",
]);
export type TestType = z.infer<typeof TestTypeSchema>;
export const DEFAULT_TEST_TYPES: TestType[] = ["Happy Path Tests", "Edge Cases", "Error Scenarios"];

export const ComplexityLevelSchema = z.enum(["Basic", "Intermediate", "Advanced"]);
export type ComplexityLevel = z.infer<typeof ComplexityLevelSchema>;

// ── Complexity analysis options ───────────────────────────────────────
export const AnalysisAreaSchema = z.enum([
  "Cyclomatic Complexity",
  "Dependency Analysis",
  "Anti-pattern Detection",
  "Performance Issues",
  "Maintainability Score",
  "Security Concerns",
]);
export type AnalysisArea = z.infer<typeof AnalysisAreaSchema>;
export const DEFAULT_ANALYSIS_AREAS: AnalysisArea[] = [
  "Cyclomatic Complexity",
  "Dependency Analysis",
  "Anti-pattern Detection",
];

export const DetailLevelSchema = z.enum(["Summary", "Detailed", "Comprehensive"]);
export type DetailLevel = z.infer<typeof DetailLevelSchema>;

// ── Formatted output ──────────────────────────────────────────────────
export const SectionKindSchema = z.enum(["TestCases", "Analysis"]);
export type SectionKind = z.infer<typeof SectionKindSchema>;

export const ContentBlockSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("text"), content: z.string() }),
  z.object({ type: z.literal("code"), content: z.string(), language: z.string().optional() }),
]);
export type ContentBlock = z.infer<typeof ContentBlockSchema>;

export const SectionSchema = z.object({
  title: z.string(),
  body: z.string(),
  blocks: z.array(ContentBlockSchema),
});
export type Section = z.infer<typeof SectionSchema>;

export const FormattedDocumentSchema = z.object({
  kind: SectionKindSchema,
  sections: z.array(SectionSchema).min(1),
});
export type FormattedDocument = z.infer<typeof FormattedDocumentSchema>;

export const MetricSchema = z.object({
  label: z.string().min(1),
  value: z.string().min(1),
});
export type Metric = z.infer<typeof MetricSchema>;

// ── Report (what the shells receive) ──────────────────────────────────
export const ReportSchema = z.object({
  kind: SectionKindSchema,
  model: z.string().min(1),
  document: FormattedDocumentSchema,
  markdown: z.string(),
  metrics: z.array(MetricSchema),
  raw: z.string(),
});
export type Report = z.infer<typeof ReportSchema>;
