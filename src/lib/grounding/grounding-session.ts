import { calculateConfidence, validateStepGrounding } from "@/lib/grounding/confidence";
import { sequenceRatio } from "@/lib/grounding/sequence-ratio";
import { boundedSimilarity, type SimilarityContext } from "@/lib/grounding/similarity";
import { calculateTechnicalScore } from "@/lib/grounding/technical-score";
import { countShared, countTermHits, extractKeywords, isMatchStopword, normalizeToken } from "@/lib/pipeline/keywords";
import lexicon from "@/lib/pipeline/lexicon.json";
import { formatTimestamp } from "@/lib/pipeline/transcript/parse-transcript";
import type { Logger, ParsedSentence } from "@/lib/pipeline/types";
import type {
  GeneratedStep,
  KnowledgeSource,
  ScreenshotData,
  SourceReference,
  StepSourceData,
} from "@/types/steps";

export type MatchWeights = {
  word: number;
  keyword: number;
  phrase: number;
  semantic: number;
  char: number;
};

export type GroundingSettings = {
  weights: MatchWeights;
  minSimilarity: number;
  minSharedWords: number;
  maxTranscriptSources: number;
  reusePenaltyPerUse: number;
  maxReusePenalty: number;
};

export type StepEvidence = {
  knowledgeSources?: KnowledgeSource[];
  screenshots?: ScreenshotData[];
};

const GROUNDING_ACTION_VERBS: readonly string[] = lexicon.groundingActionVerbs;
const VISUAL_ACTION_VERBS: readonly string[] = lexicon.visualActionVerbs;
const ACTION_VERB_BONUS = 0.1;
const TECHNICAL_BONUS = 0.2;
const TECHNICAL_BONUS_FLOOR = 0.1;
const KNOWLEDGE_MIN_SCORE = 0.2;
const KNOWLEDGE_MAX_SOURCES = 3;
const KNOWLEDGE_COMPARE_CHARS = 2000;
const KNOWLEDGE_EXCERPT_CHARS = 300;
const VISUAL_ELEMENT_SCORE = 0.8;
const VISUAL_MIN_SCORE = 0.4;
const VISUAL_MAX_SOURCES = 3;
const ARTICLE_PATTERN = /\b(?:the|a|an)\b/g;

type StepQuery = {
  searchText: string;
  searchLower: string;
  searchWords: Set<string>;
  keyWords: string[];
  phrases: string[];
  actionVerbs: string[];
};

type ConstructorInput = {
  documentId: string;
  sentences: ParsedSentence[];
  settings: GroundingSettings;
  context: SimilarityContext | null;
  logger: Logger;
};

/**
 * Mutable grounding state for one document: the technical-score catalog,
 * how often each sentence has been cited, the similarity cache and the
 * sources found per step. Never share a session between documents.
 */
export class GroundingSession {
  readonly documentId: string;
  private readonly sentences: ParsedSentence[];
  private readonly sentenceWords: Set<string>[];
  private readonly technicalScores: number[];
  private readonly reuseCounts = new Map<number, number>();
  private readonly stepSources = new Map<number, StepSourceData>();
  private readonly settings: GroundingSettings;
  private readonly context: SimilarityContext | null;
  private readonly logger: Logger;

  constructor(input: ConstructorInput) {
    this.documentId = input.documentId;
    this.sentences = input.sentences;
    this.settings = input.settings;
    this.context = input.context;
    this.logger = input.logger;
    this.sentenceWords = input.sentences.map((sentence) => significantWords(sentence.text));
    this.technicalScores = input.sentences.map((sentence) => calculateTechnicalScore(sentence.text));
  }

  get sentenceCount(): number {
    return this.sentences.length;
  }

  get similarityCacheSize(): number {
    return this.context?.cacheSize ?? 0;
  }

  getTechnicalScore(sentenceIndex: number): number {
    return this.technicalScores[sentenceIndex] ?? 0;
  }

  getReuseCount(sentenceIndex: number): number {
    return this.reuseCounts.get(sentenceIndex) ?? 0;
  }

  async buildStepSources(stepIndex: number, step: GeneratedStep, evidence: StepEvidence = {}): Promise<StepSourceData> {
    const stepContent = `${step.summary} ${step.details}`;
    const query = buildQuery(step);

    if (this.context && this.settings.weights.semantic > 0) {
      await this.context.warm([query.searchText]);
    }

    const sources = [
      ...this.findTranscriptSources(query),
      ...this.findVisualSources(step, evidence.screenshots ?? []),
      ...this.findKnowledgeSources(query, evidence.knowledgeSources ?? []),
    ];

    const partial = {
      sources,
      overallConfidence: calculateConfidence(sources),
      hasTranscriptSupport: sources.some((source) => source.type === "transcript"),
    };
    const { warnings } = validateStepGrounding(partial);

    const stepData: StepSourceData = {
      stepIndex,
      stepContent,
      sources,
      overallConfidence: partial.overallConfidence,
      hasTranscriptSupport: partial.hasTranscriptSupport,
      hasVisualSupport: sources.some((source) => source.type === "visual"),
      validationFlags: warnings,
    };

    this.stepSources.set(stepIndex, stepData);
    this.logger(
      `[ground] ${this.documentId} step ${stepIndex}: confidence ${stepData.overallConfidence.toFixed(2)}, ` +
        `${sources.length} sources`,
    );

    return stepData;
  }

  getAllStepSources(): StepSourceData[] {
    return Array.from(this.stepSources.values()).sort((left, right) => left.stepIndex - right.stepIndex);
  }

  private findTranscriptSources(query: StepQuery): SourceReference[] {
    const { weights } = this.settings;
    const matches: SourceReference[] = [];

    this.sentences.forEach((sentence, index) => {
      const sentenceWords = this.sentenceWords[index] ?? new Set<string>();
      const shared = countShared(query.searchWords, sentenceWords);

      if (shared < this.settings.minSharedWords) {
        return;
      }

      const sentenceLower = sentence.text.toLowerCase();
      const union = query.searchWords.size + sentenceWords.size - shared;
      const wordOverlap = union > 0 ? shared / union : 0;
      const keywordScore = fractionContained(query.keyWords, sentenceLower);
      const phraseScore = fractionContained(query.phrases, normalizedSentence(sentenceLower));
      const semanticScore =
        this.context && weights.semantic > 0
          ? boundedSimilarity(this.context.similarity(query.searchText, sentence.text))
          : 0;
      const charScore = weights.char > 0 ? sequenceRatio(query.searchLower, sentenceLower) : 0;

      let score =
        wordOverlap * weights.word +
        keywordScore * weights.keyword +
        phraseScore * weights.phrase +
        semanticScore * weights.semantic +
        charScore * weights.char;

      if (query.actionVerbs.some((verb) => countTermHits(sentenceLower, verb) > 0)) {
        score += ACTION_VERB_BONUS;
      }

      const penalty = Math.min(this.settings.maxReusePenalty, this.settings.reusePenaltyPerUse * this.getReuseCount(index));
      score *= 1 - penalty;

      if (score >= TECHNICAL_BONUS_FLOOR) {
        score += this.getTechnicalScore(index) * TECHNICAL_BONUS;
      }

      const confidence = Math.min(1, score);

      if (confidence < this.settings.minSimilarity) {
        return;
      }

      matches.push({
        type: "transcript",
        excerpt: sentence.text,
        confidence,
        sentenceIndex: sentence.sentenceIndex,
        ...(sentence.timestamp === null ? {} : { timestamp: formatTimestamp(sentence.timestamp) }),
      });
    });

    const top = matches
      .sort((left, right) => right.confidence - left.confidence)
      .slice(0, this.settings.maxTranscriptSources);

    for (const source of top) {
      if (source.sentenceIndex !== undefined) {
        this.reuseCounts.set(source.sentenceIndex, this.getReuseCount(source.sentenceIndex) + 1);
      }
    }

    return top;
  }

  private findKnowledgeSources(query: StepQuery, knowledgeSources: KnowledgeSource[]): SourceReference[] {
    const matches: SourceReference[] = [];

    for (const knowledge of knowledgeSources) {
      if (knowledge.error || !knowledge.content) {
        continue;
      }

      const contentLower = knowledge.content.toLowerCase();
      const contentWords = significantWords(knowledge.content);
      const shared = countShared(query.searchWords, contentWords);
      const union = query.searchWords.size + contentWords.size - shared;
      const wordOverlap = query.searchWords.size > 0 && union > 0 ? shared / union : 0;
      const charScore = sequenceRatio(query.searchLower, contentLower.slice(0, KNOWLEDGE_COMPARE_CHARS));
      const confidence = wordOverlap * 0.6 + charScore * 0.4;

      if (confidence < KNOWLEDGE_MIN_SCORE) {
        continue;
      }

      matches.push({
        type: "knowledge",
        excerpt:
          knowledge.content.length > KNOWLEDGE_EXCERPT_CHARS
            ? `${knowledge.content.slice(0, KNOWLEDGE_EXCERPT_CHARS)}...`
            : knowledge.content,
        confidence,
        url: knowledge.url,
        title: knowledge.title || "Untitled",
      });
    }

    return matches.sort((left, right) => right.confidence - left.confidence).slice(0, KNOWLEDGE_MAX_SOURCES);
  }

  private findVisualSources(step: GeneratedStep, screenshots: ScreenshotData[]): SourceReference[] {
    const targets = extractActionTargets(step.actions);
    const searchLower = `${step.title} ${step.summary} ${step.details}`.toLowerCase();
    const matches: SourceReference[] = [];

    for (const screenshot of screenshots) {
      for (const element of screenshot.uiElements) {
        const elementText = element.text.toLowerCase().trim();

        if (!elementText) {
          continue;
        }

        for (const target of targets) {
          if (target.includes(elementText) || elementText.includes(target)) {
            matches.push({
              type: "visual",
              excerpt: `Screenshot showing ${element.type}: '${element.text}'`,
              confidence: VISUAL_ELEMENT_SCORE,
              screenshotRef: screenshot.filename,
              uiElements: [element.text],
            });
          }
        }
      }

      const similarity = sequenceRatio(searchLower, screenshot.content.toLowerCase());

      if (similarity >= VISUAL_MIN_SCORE) {
        matches.push({
          type: "visual",
          excerpt: `Screenshot content: ${screenshot.content.slice(0, 100)}...`,
          confidence: similarity,
          screenshotRef: screenshot.filename,
        });
      }
    }

    return matches.sort((left, right) => right.confidence - left.confidence).slice(0, VISUAL_MAX_SOURCES);
  }
}

// Words longer than two characters with surrounding punctuation removed.
export function significantWords(text: string): Set<string> {
  return new Set(extractKeywords(text, { stopwords: [] }));
}

function buildQuery(step: GeneratedStep): StepQuery {
  const searchText = `${step.title} ${step.summary} ${step.details} ${step.actions.join(" ")}`;
  const orderedWords = searchText
    .toLowerCase()
    .split(/\s+/)
    .map((word) => normalizeToken(word))
    .filter((word) => word.length > 2 && !isMatchStopword(word));
  const searchWords = new Set(extractKeywords(searchText));
  const phrases = new Set<string>();

  for (let index = 0; index + 1 < orderedWords.length; index += 1) {
    const first = orderedWords[index] ?? "";
    const second = orderedWords[index + 1] ?? "";

    if (first.length > 3 && second.length > 3) {
      phrases.add(`${first} ${second}`);
    }
  }

  const actionsLower = step.actions.join(" ").toLowerCase();

  return {
    searchText,
    searchLower: searchText.toLowerCase(),
    searchWords,
    keyWords: Array.from(searchWords).filter((word) => word.length > 4),
    phrases: Array.from(phrases),
    actionVerbs: GROUNDING_ACTION_VERBS.filter((verb) => countTermHits(actionsLower, verb) > 0),
  };
}

function fractionContained(needles: string[], haystack: string): number {
  if (needles.length === 0) {
    return 0;
  }

  return needles.filter((needle) => haystack.includes(needle)).length / needles.length;
}

function normalizedSentence(sentenceLower: string): string {
  return sentenceLower
    .split(/\s+/)
    .map((word) => normalizeToken(word))
    .filter(Boolean)
    .join(" ");
}

/**
 * "Click the Create button" -> "create button": the words after the first
 * recognised verb, with articles removed.
 */
export function extractActionTargets(actions: string[]): string[] {
  const targets: string[] = [];

  for (const action of actions) {
    const lower = action.toLowerCase();
    const verb = VISUAL_ACTION_VERBS.find((candidate) => lower.includes(candidate));

    if (!verb) {
      continue;
    }

    const target = lower
      .slice(lower.indexOf(verb) + verb.length)
      .replace(ARTICLE_PATTERN, " ")
      .replace(/\s+/g, " ")
      .trim();

    if (target) {
      targets.push(target);
    }
  }

  return targets;
}
