#!/usr/bin/env node
import "dotenv/config";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { AssistantClient } from "../core/client/index.js";
import { loadConfig } from "../core/config/index.js";
import { highlightCode } from "../core/formatter/index.js";
import { buildReport } from "../core/report.js";
import {
  assertAllowedFile,
  decodeBytes,
  describeUpload,
  parseAnalysisRequest,
  parseTestCaseRequest,
} from "../core/requests/index.js";
import { createLLMProvider } from "../providers/index.js";
import { parseArgs } from "./args.js";

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  const config = loadConfig();

  assertAllowedFile(args.file);
  const code = decodeBytes(args.file, await fs.readFile(args.file));
  const upload = describeUpload(path.basename(args.file), code);

  const llm = createLLMProvider({
    forceProvider: config.provider,
    apiKey: config.groqApiKey,
    model: config.defaultModel,
    baseURL: config.groqBaseUrl,
  });
  const client = new AssistantClient({ llm, chunkSize: config.chunkSize });

  console.log("═══════════════════════════════════════════════════════");
  console.log("  BW Assist");
  console.log("═══════════════════════════════════════════════════════");
  console.log(`  Provider: ${llm.name}`);
  console.log(`  File:     ${upload.name} (${upload.size.toLocaleString("en-US")} characters)`);
  if (upload.large) {
    console.log("  Large file, preview of the first part:");
  }
  console.log(highlightCode(upload.preview));
  console.log("───────────────────────────────────────────────────────\n");

  const model = args.model ?? config.defaultModel;

  if (args.command === "test-cases") {
    const request = parseTestCaseRequest({ code, model });
    const result = await client.generateTestCases(request.code, request);
    if (!result.ok) throw result.error;
    console.log(buildReport("TestCases", request.model, result.value).markdown);
    return;
  }

  const request = parseAnalysisRequest({ code, model });
  const result = await client.analyzeCode(request.code, request);
  if (!result.ok) throw result.error;

  const report = buildReport("Analysis", request.model, result.value);
  if (report.metrics.length > 0) {
    console.log("── Metrics ────────────────────────────────────────");
    for (const metric of report.metrics) {
      console.log(`  ${metric.label}: ${metric.value}`);
    }
    console.log("");
  }
  console.log(report.markdown);
}

main().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : "Unknown error";
  console.error(`\n❌ ${message}`);
  process.exitCode = 1;
});
