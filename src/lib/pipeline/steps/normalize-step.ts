import type { GeneratedStep, KnowledgeSource, ScreenshotData } from "@/types/steps";

const LIST_MARKER = /^\s*(?:[-*•]|\d+[.)])\s+/;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function firstString(...values: unknown[]): string {
  for (const value of values) {
    if (typeof value === "string" && value.trim()) {
      return value.trim();
    }
  }

  return "";
}

function normalizeActions(value: unknown): string[] {
  if (Array.isArray(value)) {
    return value
      .filter((item): item is string => typeof item === "string")
      .map((item) => item.trim())
      .filter(Boolean);
  }

  if (typeof value === "string") {
    return value
      .split(/\r?\n/)
      .map((line) => line.replace(LIST_MARKER, "").trim())
      .filter(Boolean);
  }

  return [];
}

/**
 * Turns whatever the step generator returned into a GeneratedStep.
 * `overview` stands in for a missing summary and `content` for missing
 * details. Returns null when the value is not an object.
 */
export function normalizeGeneratedStep(raw: unknown): GeneratedStep | null {
  if (!isRecord(raw)) {
    return null;
  }

  return {
    title: firstString(raw.title),
    summary: firstString(raw.summary, raw.overview),
    details: firstString(raw.details, raw.content),
    actions: normalizeActions(raw.actions),
  };
}

export function normalizeScreenshot(raw: unknown): ScreenshotData | null {
  if (!isRecord(raw) || typeof raw.filename !== "string") {
    return null;
  }

  const elements = Array.isArray(raw.uiElements) ? raw.uiElements : [];

  return {
    filename: raw.filename,
    content: firstString(raw.content),
    uiElements: elements.flatMap((element) =>
      isRecord(element) && typeof element.text === "string"
        ? [{ text: element.text, type: firstString(element.type) || "element" }]
        : [],
    ),
  };
}

export function normalizeKnowledgeSource(raw: unknown): KnowledgeSource | null {
  if (!isRecord(raw) || typeof raw.content !== "string") {
    return null;
  }

  return {
    url: firstString(raw.url),
    title: firstString(raw.title) || "Untitled",
    content: raw.content,
    type: firstString(raw.type) || "web",
    ...(typeof raw.error === "string" && raw.error ? { error: raw.error } : {}),
  };
}
