export type SpeakerRole = "instructor" | "participant";

export type ParsedSentence = {
  text: string;
  rawText: string;
  sentenceIndex: number;
  timestamp: number | null;
  speaker: string | null;
  speakerRole: SpeakerRole | null;
  isQuestion: boolean;
  isTransition: boolean;
  hasEmphasis: boolean;
  followsLongPause: boolean;
  speakerChanged: boolean;
};

export type TranscriptMetadata = {
  totalSentences: number;
  totalSpeakers: number;
  speakerNames: string[];
  durationSeconds: number | null;
  hasTimestamps: boolean;
  primarySpeaker: string | null;
  primarySpeakerRatio: number;
  hasQaSections: boolean;
  questionCount: number;
  transitionCount: number;
};

export type TopicSegment = {
  segmentIndex: number;
  sentences: ParsedSentence[];
  startTimestamp: number | null;
  endTimestamp: number | null;
  durationSeconds: number | null;
  primarySpeaker: string | null;
  speakerCounts: Record<string, number>;
  hasTransitionStart: boolean;
  hasQaSection: boolean;
  questionCount: number;
  coherenceScore: number;
  fallbackSplit: boolean;
};

export type QASection = {
  segmentIndex: number;
  startSentenceIndex: number;
  endSentenceIndex: number;
  questionCount: number;
  totalSentences: number;
  qaDensity: number;
  isQaDense: boolean;
  primarySpeaker: string | null;
  speakers: string[];
};

export type TopicScore = {
  segmentIndex: number;
  importanceScore: number;
  proceduralScore: number;
  actionDensity: number;
  coherenceScore: number;
  weightedProcedural: number;
  weightedActionDensity: number;
  weightedCoherence: number;
};

export type Logger = (message: string) => void;
