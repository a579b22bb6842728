// Voice Command Relay - Fuzzy Matcher
// Approximate matching of trigger phrases inside transcript text.
//
// Similarity is a weighted Levenshtein distance over Unicode code points where
// phonetically confusable units (ㅋ/ㄱ, l/r, ...) substitute at a reduced cost.
// Hangul syllables are compared jamo by jamo, so "클로드" and "글로드" differ
// only by one confusable initial consonant.

import type { MatchResult, MatchStrategy } from "./types.js";

// ─── Configuration ──────────────────────────────────────────────────────────────

export interface FuzzyMatcherOptions {
  /** Minimum similarity for a fuzzy hit. Matches exactly at the threshold are accepted. */
  threshold: number;
  /** Candidates (tokens, windows, whole text) shorter than this are not scored. */
  minCandidateLength: number;
  /** Candidates longer than this are not scored. Also caps the sliding window. */
  maxCandidateLength: number;
  /** Substitution cost for a confusable pair, in [0, 1]. */
  phoneticSubstitutionCost: number;
  /** Symmetric confusable pairs. Hangul compatibility jamo are accepted and matched as initials. */
  confusablePairs: ReadonlyArray<readonly [string, string]>;
}

/**
 * Confusions common for Korean speakers: aspirated/plain Korean initials and
 * English l/r, f/p, v/b, th→s/t.
 */
export const DEFAULT_CONFUSABLE_PAIRS: ReadonlyArray<readonly [string, string]> = [
  ["ㅋ", "ㄱ"],
  ["ㅌ", "ㄷ"],
  ["ㅍ", "ㅂ"],
  ["ㅊ", "ㅈ"],
  ["ㅎ", "ㅇ"],
  ["l", "r"],
  ["f", "p"],
  ["v", "b"],
  ["s", "t"],
];

export const DEFAULT_MATCHER_OPTIONS: FuzzyMatcherOptions = {
  threshold: 0.8,
  minCandidateLength: 2,
  maxCandidateLength: 10,
  phoneticSubstitutionCost: 0.2,
  confusablePairs: DEFAULT_CONFUSABLE_PAIRS,
};

/** Candidates whose length differs from the trigger by more than this ratio score 0. */
const MAX_LENGTH_DIFF_RATIO = 0.5;

// ─── Hangul decomposition ───────────────────────────────────────────────────────

const HANGUL_BASE = 0xac00;
const HANGUL_LAST = 0xd7a3;
const MEDIAL_COUNT = 21;
const FINAL_COUNT = 28;
const CHOSEONG_BASE = 0x1100;
const JUNGSEONG_BASE = 0x1161;
const JONGSEONG_BASE = 0x11a7;

/**
 * Splits a precomposed Hangul syllable into conjoining jamo
 * [initial, medial, final]; final is "" for open syllables.
 * Returns null for anything else.
 */
export function decomposeHangul(unit: string): [string, string, string] | null {
  const code = unit.codePointAt(0);
  if (code === undefined || code < HANGUL_BASE || code > HANGUL_LAST) {
    return null;
  }

  const index = code - HANGUL_BASE;
  const initial = Math.floor(index / (MEDIAL_COUNT * FINAL_COUNT));
  const medial = Math.floor((index % (MEDIAL_COUNT * FINAL_COUNT)) / FINAL_COUNT);
  const final = index % FINAL_COUNT;

  return [
    String.fromCodePoint(CHOSEONG_BASE + initial),
    String.fromCodePoint(JUNGSEONG_BASE + medial),
    final === 0 ? "" : String.fromCodePoint(JONGSEONG_BASE + final),
  ];
}

/** Lowercase, trim and NFC-normalize text before comparison. */
export function normalizeForMatch(text: string): string {
  return text.normalize("NFC").toLowerCase().trim();
}

function toUnits(text: string): string[] {
  return Array.from(text);
}

// ─── Matcher ────────────────────────────────────────────────────────────────────

export class FuzzyMatcher {
  readonly options: FuzzyMatcherOptions;
  private readonly confusable: Set<string>;

  constructor(options: Partial<FuzzyMatcherOptions> = {}) {
    this.options = { ...DEFAULT_MATCHER_OPTIONS, ...options };
    this.confusable = new Set();

    for (const [a, b] of this.options.confusablePairs) {
      // Compatibility jamo (ㅋ) decompose to their initial-consonant form (ᄏ) under NFKD
      const left = a.normalize("NFKD").toLowerCase();
      const right = b.normalize("NFKD").toLowerCase();
      this.confusable.add(pairKey(left, right));
      this.confusable.add(pairKey(right, left));
    }
  }

  /**
   * Similarity of two short strings in [0, 1].
   * Case-insensitive; 1 for identical text, 0 when either side is empty or
   * the lengths differ by more than 50%.
   */
  similarity(a: string, b: string): number {
    const left = toUnits(normalizeForMatch(a));
    const right = toUnits(normalizeForMatch(b));

    if (left.length === 0 || right.length === 0) return 0;

    const maxLength = Math.max(left.length, right.length);
    const lengthDiff = Math.abs(left.length - right.length);
    if (lengthDiff / maxLength > MAX_LENGTH_DIFF_RATIO) return 0;

    const distance = this.weightedDistance(left, right);
    return Math.max(0, (maxLength - distance) / maxLength);
  }

  /**
   * Looks for `trigger` inside `text`.
   *
   * An exact (case-insensitive) substring hit returns immediately. Otherwise
   * the whole text, each whitespace token and each sliding window of the
   * trigger's length are scored, and the best candidate at or above
   * `threshold` wins.
   */
  matchTrigger(trigger: string, text: string, threshold: number = this.options.threshold): MatchResult {
    const cleanTrigger = normalizeForMatch(trigger);
    const cleanText = normalizeForMatch(text);

    if (!cleanTrigger || !cleanText) {
      return { kind: "none", matched: false, score: 0 };
    }

    if (cleanText.includes(cleanTrigger)) {
      return { kind: "exact", matched: true, score: 1, matchedText: cleanTrigger, strategy: "substring" };
    }

    const candidates: Array<{ text: string; strategy: MatchStrategy }> = [
      { text: cleanText, strategy: "whole" },
    ];

    for (const token of cleanText.split(/\s+/)) {
      if (token) candidates.push({ text: token, strategy: "token" });
    }

    const textUnits = toUnits(cleanText);
    const triggerLength = toUnits(cleanTrigger).length;
    const windowSize = Math.min(
      this.options.maxCandidateLength,
      Math.max(triggerLength, this.options.minCandidateLength),
    );
    for (let start = 0; start + windowSize <= textUnits.length; start++) {
      candidates.push({ text: textUnits.slice(start, start + windowSize).join(""), strategy: "window" });
    }

    let best: { score: number; text: string; strategy: MatchStrategy } | null = null;
    for (const candidate of candidates) {
      const length = toUnits(candidate.text).length;
      if (length < this.options.minCandidateLength || length > this.options.maxCandidateLength) {
        continue;
      }
      const score = this.similarity(cleanTrigger, candidate.text);
      if (best === null || score > best.score) {
        best = { score, ...candidate };
      }
    }

    if (best !== null && best.score >= threshold) {
      return { kind: "fuzzy", matched: true, score: best.score, matchedText: best.text, strategy: best.strategy };
    }

    return { kind: "none", matched: false, score: best?.score ?? 0 };
  }

  /** Cost of substituting one unit for another. */
  substitutionCost(a: string, b: string): number {
    if (a === b) return 0;
    if (this.confusable.has(pairKey(a, b))) return this.options.phoneticSubstitutionCost;

    const left = decomposeHangul(a);
    const right = decomposeHangul(b);
    if (left && right) {
      let differs = false;
      for (let i = 0; i < 3; i++) {
        if (left[i] === right[i]) continue;
        if (!this.confusable.has(pairKey(left[i], right[i]))) return 1;
        differs = true;
      }
      return differs ? this.options.phoneticSubstitutionCost : 0;
    }

    return 1;
  }

  /** Levenshtein distance with phonetic substitution costs, two rolling rows. */
  private weightedDistance(source: string[], target: string[]): number {
    let previous = Array.from({ length: target.length + 1 }, (_, j) => j);
    let current = new Array<number>(target.length + 1).fill(0);

    for (let i = 1; i <= source.length; i++) {
      current[0] = i;
      for (let j = 1; j <= target.length; j++) {
        current[j] = Math.min(
          current[j - 1] + 1,
          previous[j] + 1,
          previous[j - 1] + this.substitutionCost(source[i - 1], target[j - 1]),
        );
      }
      [previous, current] = [current, previous];
    }

    return previous[target.length];
  }
}

function pairKey(a: string, b: string): string {
  return `${a}\u0000${b}`;
}

// ─── Default instance ───────────────────────────────────────────────────────────

const defaultMatcher = new FuzzyMatcher();

export function similarity(a: string, b: string): number {
  return defaultMatcher.similarity(a, b);
}

export function matchTrigger(trigger: string, text: string, threshold?: number): MatchResult {
  return defaultMatcher.matchTrigger(trigger, text, threshold);
}
