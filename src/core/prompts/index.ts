import type {
  AnalysisArea,
  ComplexityLevel,
  DetailLevel,
  TestType,
} from "../schemas/index.js";
import { splitIntoChunks } from "./chunking.js";

export { splitIntoChunks, mergeChunkResults } from "./chunking.js";

/** One provider call: prompts plus sampling parameters. */
export interface PromptPlan {
  systemPrompt: string;
  userMessage: string;
  temperature: number;
  maxTokens: number;
}

export interface TestCasePromptOptions {
  testTypes: readonly TestType[];
  complexityLevel: ComplexityLevel;
}

export interface AnalysisPromptOptions {
  analysisAreas: readonly AnalysisArea[];
  detailLevel: DetailLevel;
}

const TEST_CASE_TEMPERATURE = 0.3;
const ANALYSIS_TEMPERATURE = 0.2;
const FULL_MAX_TOKENS = 4000;
const CHUNK_MAX_TOKENS = 3000;

// ── System prompts ────────────────────────────────────────────────────
export const TEST_CASE_SYSTEM_PROMPT =
  "You are a senior TIBCO BusinessWorks developer who writes thorough, executable test cases.";
export const TEST_CASE_CHUNK_SYSTEM_PROMPT =
  "You are a senior TIBCO BusinessWorks developer who writes test cases for one part of a larger process at a time.";
export const ANALYSIS_SYSTEM_PROMPT =
  "You are a TIBCO BusinessWorks architect who reviews processes for complexity, dependencies and risk.";
export const ANALYSIS_CHUNK_SYSTEM_PROMPT =
  "You are a TIBCO BusinessWorks architect who reviews the complexity of one part of a large process at a time.";

// ── Prompt bodies ─────────────────────────────────────────────────────
function testRequirements(options: TestCasePromptOptions): string {
  return [
    "Test Requirements:",
    `- Test Types: ${options.testTypes.join(", ")}`,
    `- Complexity Level: ${options.complexityLevel}`,
  ].join("\n");
}

function analysisRequirements(options: AnalysisPromptOptions): string {
  return [
    "Analysis Requirements:",
    `- Analysis Areas: ${options.analysisAreas.join(", ")}`,
    `- Detail Level: ${options.detailLevel}`,
  ].join("\n");
}

function codeBlock(code: string, index?: number, total?: number): string {
  const label =
    index !== undefined && total !== undefined
      ? `TIBCO Code/XML (part ${index + 1} of ${total}):`
      : "TIBCO Code/XML:";
  return `${label}\n${code}`;
}

export function buildTestCasePrompt(code: string, options: TestCasePromptOptions): string {
  return `Review the TIBCO BusinessWorks code/XML below and write comprehensive test cases for it.

${codeBlock(code)}

${testRequirements(options)}

Structure the answer as:
1. **Test Case Overview** - what the process does and what is under test
2. **Input Data Sets** - concrete input values for every scenario
3. **Expected Results** - the expected output for each input
4. **Test Steps** - how to run each test, step by step
5. **Edge Cases** - boundary conditions and unusual inputs
6. **Error Scenarios** - invalid inputs and fault handling
7. **Validation Points** - what to check while the test runs

Number each case as "Test Case N: <name>". Use bullet points, and code examples where they help.
Keep to BusinessWorks testing practice.`;
}

export function buildTestCaseChunkPrompt(
  code: string,
  index: number,
  total: number,
  options: TestCasePromptOptions,
): string {
  return `${codeBlock(code, index, total)}

${testRequirements(options)}

Write test cases for the components in this part only:
1. **Chunk Analysis** - components and logic present in this part
2. **Test Scenarios** - test cases for this part's behaviour
3. **Input Data** - inputs needed to exercise this part
4. **Expected Results** - outputs this part should produce
5. **Integration Points** - how this part connects to the rest of the process

Be concise but complete.`;
}

export function buildAnalysisPrompt(code: string, options: AnalysisPromptOptions): string {
  return `Review the TIBCO BusinessWorks code/XML below for complexity, design patterns and potential problems.

${codeBlock(code)}

${analysisRequirements(options)}

Cover:

1. **Complexity Metrics**
   - Cyclomatic complexity score
   - Nesting depth
   - Number of decision points

2. **Architecture Analysis**
   - Process flow complexity
   - Component interactions
   - Data transformation complexity

3. **Dependency Analysis**
   - External dependencies
   - Coupling between components
   - Shared resources

4. **Anti-pattern Detection**
   - Known BusinessWorks anti-patterns
   - Code smells
   - Maintainability problems

5. **Performance Implications**
   - Likely bottlenecks
   - Memory usage
   - Processing efficiency

6. **Recommendations**
   - Refactoring suggestions
   - Practice improvements
   - Optimisation opportunities

7. **Risk Assessment**
   - Maintainability score (1-10)
   - Complexity rating (Low/Medium/High)
   - Priority areas for improvement

Use clear sections, concrete metrics and actionable recommendations.`;
}

export function buildAnalysisChunkPrompt(
  code: string,
  index: number,
  total: number,
  options: AnalysisPromptOptions,
): string {
  return `${codeBlock(code, index, total)}

${analysisRequirements(options)}

Analyse this part only:
1. **Chunk Complexity** - complexity metrics for this part
2. **Local Dependencies** - dependencies inside this part
3. **Component Analysis** - BusinessWorks activities used and how complex they are
4. **Chunk-specific Issues** - problems found in this part
5. **Integration Impact** - how this part affects the overall process

Be concise and focus on actionable findings.`;
}

// ── Plans ─────────────────────────────────────────────────────────────
export function planTestCasePrompts(
  code: string,
  options: TestCasePromptOptions,
  chunkSize: number,
): PromptPlan[] {
  const chunks = splitIntoChunks(code, chunkSize);
  if (chunks.length === 1) {
    return [
      {
        systemPrompt: TEST_CASE_SYSTEM_PROMPT,
        userMessage: buildTestCasePrompt(code, options),
        temperature: TEST_CASE_TEMPERATURE,
        maxTokens: FULL_MAX_TOKENS,
      },
    ];
  }
  return chunks.map((chunk, index) => ({
    systemPrompt: TEST_CASE_CHUNK_SYSTEM_PROMPT,
    userMessage: buildTestCaseChunkPrompt(chunk, index, chunks.length, options),
    temperature: TEST_CASE_TEMPERATURE,
    maxTokens: CHUNK_MAX_TOKENS,
  }));
}

export function planAnalysisPrompts(
  code: string,
  options: AnalysisPromptOptions,
  chunkSize: number,
): PromptPlan[] {
  const chunks = splitIntoChunks(code, chunkSize);
  if (chunks.length === 1) {
    return [
      {
        systemPrompt: ANALYSIS_SYSTEM_PROMPT,
        userMessage: buildAnalysisPrompt(code, options),
        temperature: ANALYSIS_TEMPERATURE,
        maxTokens: FULL_MAX_TOKENS,
      },
    ];
  }
  return chunks.map((chunk, index) => ({
    systemPrompt: ANALYSIS_CHUNK_SYSTEM_PROMPT,
    userMessage: buildAnalysisChunkPrompt(chunk, index, chunks.length, options),
    temperature: ANALYSIS_TEMPERATURE,
    maxTokens: CHUNK_MAX_TOKENS,
  }));
}
