import { z, type ZodError } from "zod";
import {
  AnalysisAreaSchema,
  ComplexityLevelSchema,
  DEFAULT_ANALYSIS_AREAS,
  DEFAULT_MODEL,
  DEFAULT_TEST_TYPES,
  DetailLevelSchema,
  ModelSchema,
  TestTypeSchema,
  type AnalysisArea,
  type ComplexityLevel,
  type DetailLevel,
  type Model,
  type TestType,
} from "../schemas/index.js";
import { InputError } from "../errors.js";
import { decodeUpload } from "./upload.js";

export { decodeBytes, decodeUpload, describeUpload, assertAllowedFile, type UploadInfo } from "./upload.js";

// ── Request bodies ────────────────────────────────────────────────────
const UploadSchema = z.object({
  name: z.string().min(1, "File name is required"),
  content: z.string(),
  encoding: z.enum(["utf8", "base64"]).default("utf8"),
});

const SourceSchema = z.object({
  code: z.string().optional(),
  file: UploadSchema.optional(),
});

export const TestCaseRequestSchema = SourceSchema.extend({
  model: ModelSchema.default(DEFAULT_MODEL),
  testTypes: z
    .array(TestTypeSchema)
    .min(1, "Please select at least one test scenario type")
    .default(() => [...DEFAULT_TEST_TYPES]),
  complexityLevel: ComplexityLevelSchema.default("Intermediate"),
});

export const AnalysisRequestSchema = SourceSchema.extend({
  model: ModelSchema.default(DEFAULT_MODEL),
  analysisAreas: z
    .array(AnalysisAreaSchema)
    .min(1, "Please select at least one analysis area")
    .default(() => [...DEFAULT_ANALYSIS_AREAS]),
  detailLevel: DetailLevelSchema.default("Detailed"),
});

export interface TestCaseRequest {
  code: string;
  model: Model;
  testTypes: TestType[];
  complexityLevel: ComplexityLevel;
}

export interface AnalysisRequest {
  code: string;
  model: Model;
  analysisAreas: AnalysisArea[];
  detailLevel: DetailLevel;
}

function describeIssues(error: ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

/** Reject blank code before any provider call. */
export function requireCode(code: string): string {
  if (!code.trim()) {
    throw new InputError("Please provide TIBCO code/XML to analyze");
  }
  return code;
}

function resolveCode(source: z.infer<typeof SourceSchema>): string {
  if (source.file) {
    return requireCode(decodeUpload(source.file.name, source.file.content, source.file.encoding));
  }
  return requireCode(source.code ?? "");
}

export function parseTestCaseRequest(body: unknown): TestCaseRequest {
  const parsed = TestCaseRequestSchema.safeParse(body ?? {});
  if (!parsed.success) throw new InputError(describeIssues(parsed.error));

  const { model, testTypes, complexityLevel } = parsed.data;
  return { code: resolveCode(parsed.data), model, testTypes, complexityLevel };
}

export function parseAnalysisRequest(body: unknown): AnalysisRequest {
  const parsed = AnalysisRequestSchema.safeParse(body ?? {});
  if (!parsed.success) throw new InputError(describeIssues(parsed.error));

  const { model, analysisAreas, detailLevel } = parsed.data;
  return { code: resolveCode(parsed.data), model, analysisAreas, detailLevel };
}
