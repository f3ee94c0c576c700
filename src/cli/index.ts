#!/usr/bin/env node

import { readFile, writeFile } from "node:fs/promises";
import { Command } from "commander";
import { ensureEnvLoaded } from "@/lib/config/load-env";
import { parseSimilarityMode, resolveSimilarityScorer } from "@/lib/config/similarity";
import { SourceReferenceManager } from "@/lib/grounding/source-reference-manager";
import { QAFilter } from "@/lib/pipeline/filter/qa-filter";
import { TopicRanker } from "@/lib/pipeline/rank/topic-ranker";
import { DEFAULT_MIN_CONFIDENCE, evaluateStep, rejectionReason } from "@/lib/pipeline/run-pipeline";
import { getSegmentText } from "@/lib/pipeline/segment/topic-segment";
import { TopicSegmenter } from "@/lib/pipeline/segment/topic-segmenter";
import {
  normalizeGeneratedStep,
  normalizeKnowledgeSource,
  normalizeScreenshot,
} from "@/lib/pipeline/steps/normalize-step";
import { TranscriptCleaner } from "@/lib/pipeline/transcript/clean-transcript";
import { parseTranscript } from "@/lib/pipeline/transcript/parse-transcript";
import { ActionValidator, type ActionValidationResult } from "@/lib/validation/action-validator";
import { StepValidator } from "@/lib/validation/step-validator";
import type { StepSourceData, ValidationResult } from "@/types/steps";

type GroundedStepReport = {
  title: string;
  accepted: boolean;
  reason: string | null;
  confidence: number;
  confidenceLevel: string;
  grounding: StepSourceData;
  validation: ValidationResult;
  actionValidation: ActionValidationResult;
};

const program = new Command();
const log = (line: string) => console.error(line);

program
  .name("transcript-grounding")
  .description("Transcript segmentation and step grounding CLI")
  .version("0.1.0");

const transcript = program.command("transcript").description("Transcript operations");

transcript
  .command("parse")
  .requiredOption("--file <path>", "Raw transcript text file")
  .option("--pause-threshold <seconds>", "Gap that counts as a long pause", parseFloatSafe, 90)
  .option("--no-clean", "Keep caption markup, fillers and repeated lines")
  .option("--out <path>", "Output file path (JSON)")
  .action(async (options: { file: string; pauseThreshold: number; clean: boolean; out?: string }) => {
    try {
      const raw = await readFile(options.file, "utf8");
      const parsed = parseTranscript(raw, {
        pauseThresholdSeconds: options.pauseThreshold,
        cleaner: cleanerFor(options.clean),
        logger: log,
      });

      await emitJson(parsed, options.out);
    } catch (error) {
      const message = error instanceof Error ? error.message : "Unknown parse error";
      console.error(`Transcript parse failed: ${message}`);
      process.exitCode = 1;
    }
  });

transcript
  .command("segment")
  .requiredOption("--file <path>", "Raw transcript text file")
  .option("--min-segments <count>", "Minimum number of segments", parseInteger, 3)
  .option("--threshold <score>", "Boundary score threshold", parseFloatSafe, 0.4)
  .option("--semantic", "Use vocabulary shift as a boundary signal", false)
  .option("--filter", "Drop Q&A-dense and low-importance segments", false)
  .option("--no-clean", "Keep caption markup, fillers and repeated lines")
  .option("--out <path>", "Output file path (JSON)")
  .action(
    async (options: {
      file: string;
      minSegments: number;
      threshold: number;
      semantic: boolean;
      filter: boolean;
      clean: boolean;
      out?: string;
    }) => {
      try {
        const raw = await readFile(options.file, "utf8");
        const { sentences, metadata } = parseTranscript(raw, { cleaner: cleanerFor(options.clean), logger: log });
        const segmenter = new TopicSegmenter({
          minTotalSegments: options.minSegments,
          boundaryThreshold: options.threshold,
          useSemanticSimilarity: options.semantic,
          logger: log,
        });
        const qaFilter = new QAFilter({ logger: log });
        const ranker = new TopicRanker({ logger: log });

        const segments = segmenter.segment(sentences);
        const kept = options.filter ? ranker.filterLowImportance(qaFilter.filterSegments(segments)) : segments;

        await emitJson(
          {
            metadata,
            qaStatistics: qaFilter.getStatistics(segments),
            ranking: ranker.getRankingReport(segments),
            segments: kept.map((segment) => ({
              segmentIndex: segment.segmentIndex,
              startTimestamp: segment.startTimestamp,
              endTimestamp: segment.endTimestamp,
              primarySpeaker: segment.primarySpeaker,
              sentenceCount: segment.sentences.length,
              coherenceScore: segment.coherenceScore,
              hasQaSection: segment.hasQaSection,
              fallbackSplit: segment.fallbackSplit,
              text: getSegmentText(segment),
            })),
          },
          options.out,
        );
      } catch (error) {
        const message = error instanceof Error ? error.message : "Unknown segmentation error";
        console.error(`Transcript segmentation failed: ${message}`);
        process.exitCode = 1;
      }
    },
  );

const steps = program.command("steps").description("Generated step operations");

steps
  .command("ground")
  .requiredOption("--transcript <path>", "Raw transcript text file")
  .requiredOption("--steps <path>", "JSON array of generated steps")
  .option("--knowledge <path>", "JSON array of knowledge excerpts")
  .option("--screenshots <path>", "JSON array of screenshot descriptions")
  .option("--similarity <mode>", "Semantic scorer: lexical, embedding or none", "lexical")
  .option("--min-confidence <score>", "Acceptance confidence", parseFloatSafe, DEFAULT_MIN_CONFIDENCE)
  .option("--document-id <id>", "Name used in log lines", "document")
  .option("--min-content-words <count>", "Words a step body needs to pass the action check", parseInteger, 50)
  .option("--no-clean", "Keep caption markup, fillers and repeated lines")
  .option("--out <path>", "Output file path (JSON)")
  .action(
    async (options: {
      transcript: string;
      steps: string;
      knowledge?: string;
      screenshots?: string;
      similarity: string;
      minConfidence: number;
      documentId: string;
      minContentWords: number;
      clean: boolean;
      out?: string;
    }) => {
      try {
        ensureEnvLoaded();

        const mode = parseSimilarityMode(options.similarity);
        const manager = new SourceReferenceManager({
          similarityScorer: resolveSimilarityScorer(mode),
          ...(mode === "none" ? { weights: { word: 1, semantic: 0 } } : {}),
          logger: log,
        });
        const validator = new StepValidator({ logger: log });
        const actionValidator = new ActionValidator({ minContentWords: options.minContentWords, logger: log });

        const raw = await readFile(options.transcript, "utf8");
        const { sentences } = parseTranscript(raw, { cleaner: cleanerFor(options.clean), logger: log });
        const generated = (await readJsonArray(options.steps)).map((item) => normalizeGeneratedStep(item));
        const knowledgeSources = options.knowledge
          ? (await readJsonArray(options.knowledge)).flatMap((item) => normalizeKnowledgeSource(item) ?? [])
          : [];
        const screenshots = options.screenshots
          ? (await readJsonArray(options.screenshots)).flatMap((item) => normalizeScreenshot(item) ?? [])
          : [];

        const session = await manager.openSession(sentences, { documentId: options.documentId });
        const results: GroundedStepReport[] = [];
        const validations: ValidationResult[] = [];

        for (const [position, step] of generated.entries()) {
          if (!step) {
            log(`[steps] entry ${position} is not a step object, skipping`);
            continue;
          }

          const outcome = await evaluateStep({
            session,
            validator,
            actionValidator,
            stepIndex: validations.length,
            segmentIndex: null,
            step,
            evidence: { knowledgeSources, screenshots },
          });
          const rejection = rejectionReason(outcome, options.minConfidence);

          validations.push(outcome.validation);
          results.push({
            title: step.title,
            accepted: rejection === null,
            reason: rejection,
            confidence: outcome.confidence,
            confidenceLevel: manager.getConfidenceLevelLabel(outcome.confidence),
            grounding: outcome.grounding,
            validation: outcome.validation,
            actionValidation: outcome.actionValidation,
          });
        }

        const report = validator.getValidationReport(validations);
        await emitJson({ steps: results, validationReport: report }, options.out);

        if (!results.some((result) => result.accepted)) {
          console.error("No step passed grounding and validation.");
          process.exitCode = 1;
        }
      } catch (error) {
        const message = error instanceof Error ? error.message : "Unknown grounding error";
        console.error(`Step grounding failed: ${message}`);
        process.exitCode = 1;
      }
    },
  );

program.parseAsync(process.argv).catch((error: unknown) => {
  const message = error instanceof Error ? error.message : "Unknown CLI error";
  console.error(message);
  process.exitCode = 1;
});

function cleanerFor(clean: boolean): TranscriptCleaner | null {
  return clean ? new TranscriptCleaner({ logger: log }) : null;
}

async function emitJson(payload: unknown, outPath: string | undefined): Promise<void> {
  const serialized = `${JSON.stringify(payload, null, 2)}\n`;

  if (outPath) {
    await writeFile(outPath, serialized, "utf8");
    console.error(`Saved output to ${outPath}`);
    return;
  }

  process.stdout.write(serialized);
}

async function readJsonArray(path: string): Promise<unknown[]> {
  const content = await readFile(path, "utf8");
  const parsed: unknown = JSON.parse(content);

  if (!Array.isArray(parsed)) {
    throw new Error(`${path} must contain a JSON array`);
  }

  return parsed;
}

function parseInteger(value: string): number {
  const parsed = Number.parseInt(value, 10);

  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new Error(`Invalid integer value: ${value}`);
  }

  return parsed;
}

function parseFloatSafe(value: string): number {
  const parsed = Number.parseFloat(value);

  if (!Number.isFinite(parsed)) {
    throw new Error(`Invalid number value: ${value}`);
  }

  return parsed;
}
