import { v4 as uuidv4 } from "uuid";
import pino from "pino";
import type { LLMProvider } from "../../providers/llm-provider.js";
import type {
  AnalysisArea,
  ComplexityLevel,
  DetailLevel,
  SectionKind,
  TestType,
} from "../schemas/index.js";
import { toServiceError, type ServiceError } from "../errors.js";
import { err, ok, type Result } from "../result.js";
import { requireCode } from "../requests/index.js";
import {
  mergeChunkResults,
  planAnalysisPrompts,
  planTestCasePrompts,
  type PromptPlan,
} from "../prompts/index.js";

const logger = pino({ name: "assistant-client" });

export const DEFAULT_CHUNK_SIZE = 12_000;

/** Unstructured text exactly as the model returned it. */
export type RawText = string;

export interface AssistantClientConfig {
  llm: LLMProvider;
  /** Inputs longer than this are sent in parts. */
  chunkSize?: number;
}

export interface TestCaseOptions {
  model: string;
  testTypes: readonly TestType[];
  complexityLevel: ComplexityLevel;
}

export interface AnalysisOptions {
  model: string;
  analysisAreas: readonly AnalysisArea[];
  detailLevel: DetailLevel;
}

/**
 * AssistantClient – the AI Client boundary.
 *
 * Built once at startup and handed to the HTTP and CLI shells.
 * Large inputs are split into parts and sent one after another; the first
 * failure ends the run. Service failures come back as `err(ServiceError)`,
 * blank code throws InputError before the provider is touched.
 */
export class AssistantClient {
  private readonly llm: LLMProvider;
  private readonly chunkSize: number;

  constructor(config: AssistantClientConfig) {
    this.llm = config.llm;
    this.chunkSize = config.chunkSize ?? DEFAULT_CHUNK_SIZE;
  }

  get providerName(): string {
    return this.llm.name;
  }

  async generateTestCases(
    code: string,
    options: TestCaseOptions,
  ): Promise<Result<RawText, ServiceError>> {
    requireCode(code);
    const plans = planTestCasePrompts(code, options, this.chunkSize);
    return this.execute("TestCases", options.model, plans);
  }

  async analyzeCode(
    code: string,
    options: AnalysisOptions,
  ): Promise<Result<RawText, ServiceError>> {
    requireCode(code);
    const plans = planAnalysisPrompts(code, options, this.chunkSize);
    return this.execute("Analysis", options.model, plans);
  }

  private async execute(
    kind: SectionKind,
    model: string,
    plans: PromptPlan[],
  ): Promise<Result<RawText, ServiceError>> {
    const requestId = uuidv4();
    logger.info(
      { requestId, kind, model, provider: this.llm.name, parts: plans.length },
      "Generation started",
    );

    const outputs: string[] = [];
    for (const [index, plan] of plans.entries()) {
      try {
        outputs.push(
          await this.llm.generate(plan.systemPrompt, plan.userMessage, {
            model,
            temperature: plan.temperature,
            maxTokens: plan.maxTokens,
          }),
        );
      } catch (error) {
        const serviceError = toServiceError(error);
        logger.error(
          { requestId, part: index + 1, reason: serviceError.reason, error: serviceError.message },
          "Generation failed",
        );
        return err(serviceError);
      }
    }

    logger.info({ requestId, kind, parts: outputs.length }, "Generation completed");
    return ok(mergeChunkResults(outputs));
  }
}
