export type SourceType = "transcript" | "knowledge" | "visual";

export type SourceReference = {
  type: SourceType;
  excerpt: string;
  confidence: number;
  sentenceIndex?: number;
  timestamp?: string;
  screenshotRef?: string;
  uiElements?: string[];
  url?: string;
  title?: string;
};

export type StepSourceData = {
  stepIndex: number;
  stepContent: string;
  sources: SourceReference[];
  overallConfidence: number;
  hasTranscriptSupport: boolean;
  hasVisualSupport: boolean;
  validationFlags: string[];
};

export type GeneratedStep = {
  title: string;
  summary: string;
  details: string;
  actions: string[];
};

export type KnowledgeSource = {
  url: string;
  title: string;
  content: string;
  type: string;
  error?: string;
};

export type UiElement = {
  text: string;
  type: string;
};

export type ScreenshotData = {
  filename: string;
  content: string;
  uiElements: UiElement[];
};

export type IssueSeverity = "error" | "warning" | "info";

export type ValidationIssue = {
  issueType: string;
  severity: IssueSeverity;
  message: string;
  field: string | null;
  suggestion: string | null;
};

export type ValidationResult = {
  stepIndex: number;
  isValid: boolean;
  qualityScore: number;
  errors: ValidationIssue[];
  warnings: ValidationIssue[];
  info: ValidationIssue[];
  actionCount: number;
  titleLength: number;
  detailsLength: number;
  confidenceScore: number;
  hasDuplicates: boolean;
  autoFixAvailable: boolean;
  suggestedFixes: string[];
};
