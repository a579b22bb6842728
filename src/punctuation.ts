// Voice Command Relay - Korean auto-punctuation
// Appends ?, ! or . to a Korean sentence from its ending (종결어미) and question words.
// The ending lists live in data/korean-punctuation.json.

import { readFileSync } from "node:fs";

export type PunctuationStyle = "none" | "conservative" | "aggressive";

export type SentenceType = "question" | "exclamation" | "command" | "statement";

export interface PunctuationRules {
  questionEndings: string[];
  statementEndings: string[];
  commandEndings: string[];
  exclamationEndings: string[];
  /** A sentence containing one of these is most likely a question. */
  questionWords: string[];
  interjections: string[];
  /** Text already ending in one of these is left alone. */
  terminalPunctuation: string[];
}

const RULE_KEYS = [
  "questionEndings",
  "statementEndings",
  "commandEndings",
  "exclamationEndings",
  "questionWords",
  "interjections",
  "terminalPunctuation",
] as const;

export const DEFAULT_RULES_PATH = new URL("../data/korean-punctuation.json", import.meta.url);

export function isPunctuationStyle(value: string): value is PunctuationStyle {
  return value === "none" || value === "conservative" || value === "aggressive";
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === "string");
}

/**
 * Validates parsed JSON as punctuation rules.
 * @throws Error naming the first missing or malformed list.
 */
export function parsePunctuationRules(data: unknown): PunctuationRules {
  if (typeof data !== "object" || data === null) {
    throw new Error("Punctuation rules must be a JSON object");
  }

  const lists = new Map<string, string[]>();
  for (const key of RULE_KEYS) {
    const value: unknown = Reflect.get(data, key);
    if (!isStringArray(value)) {
      throw new Error(`Punctuation rules: "${key}" must be an array of strings`);
    }
    lists.set(key, value);
  }

  const get = (key: (typeof RULE_KEYS)[number]): string[] => lists.get(key) ?? [];
  return {
    questionEndings: get("questionEndings"),
    statementEndings: get("statementEndings"),
    commandEndings: get("commandEndings"),
    exclamationEndings: get("exclamationEndings"),
    questionWords: get("questionWords"),
    interjections: get("interjections"),
    terminalPunctuation: get("terminalPunctuation"),
  };
}

export function loadPunctuationRules(path: URL | string = DEFAULT_RULES_PATH): PunctuationRules {
  const raw: unknown = JSON.parse(readFileSync(path, "utf-8"));
  return parsePunctuationRules(raw);
}

const byLengthDesc = (a: string, b: string) => Array.from(b).length - Array.from(a).length;

export class KoreanPunctuator {
  private readonly rules: PunctuationRules;
  private readonly endings: ReadonlyArray<{ type: SentenceType; endings: string[] }>;

  constructor(rules: PunctuationRules = loadPunctuationRules()) {
    this.rules = rules;
    // Checked in this order; longer endings first within each list
    this.endings = [
      { type: "question", endings: [...rules.questionEndings].sort(byLengthDesc) },
      { type: "exclamation", endings: [...rules.exclamationEndings].sort(byLengthDesc) },
      { type: "command", endings: [...rules.commandEndings].sort(byLengthDesc) },
      { type: "statement", endings: [...rules.statementEndings].sort(byLengthDesc) },
    ];
  }

  /**
   * Classifies a sentence by question words, then by its ending.
   * Returns null when nothing matches.
   */
  detectSentenceType(text: string): SentenceType | null {
    const trimmed = text.trim();
    if (!trimmed) return null;

    if (this.rules.questionWords.some((word) => trimmed.includes(word))) {
      return "question";
    }

    for (const { type, endings } of this.endings) {
      if (endings.some((ending) => trimmed.endsWith(ending))) {
        return type;
      }
    }
    return null;
  }

  /**
   * Adds a closing punctuation mark. Text that is empty or already punctuated
   * comes back unchanged, as does everything under the "none" style.
   * "conservative" only punctuates recognized endings; "aggressive" falls back
   * to "!" after an interjection and "." otherwise.
   */
  addPunctuation(text: string, style: PunctuationStyle = "conservative"): string {
    if (style === "none") return text;

    const trimmed = text.trim();
    if (!trimmed) return text;
    if (this.rules.terminalPunctuation.some((mark) => trimmed.endsWith(mark))) {
      return text;
    }

    const type = this.detectSentenceType(trimmed);
    if (type) return trimmed + markFor(type);
    if (style === "conservative") return trimmed;

    if (this.rules.interjections.some((word) => trimmed === word || trimmed.startsWith(word + " "))) {
      return trimmed + "!";
    }
    return trimmed + ".";
  }
}

function markFor(type: SentenceType): string {
  switch (type) {
    case "question":
      return "?";
    case "exclamation":
      return "!";
    case "command":
    case "statement":
      return ".";
  }
}
