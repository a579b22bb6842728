// Unit tests for KoreanPunctuator

import { describe, it, expect } from "vitest";
import { KoreanPunctuator, isPunctuationStyle, loadPunctuationRules, parsePunctuationRules } from "./punctuation.js";

describe("KoreanPunctuator", () => {
  const punctuator = new KoreanPunctuator();

  describe("detectSentenceType", () => {
    it("classifies by ending", () => {
      expect(punctuator.detectSentenceType("밥 먹었니")).toBe("question");
      expect(punctuator.detectSentenceType("정말 예쁘구나")).toBe("exclamation");
      expect(punctuator.detectSentenceType("창문 좀 열어 주세요")).toBe("command");
      expect(punctuator.detectSentenceType("오늘은 비가 옵니다")).toBe("statement");
    });

    it("treats a question word anywhere as a question", () => {
      expect(punctuator.detectSentenceType("내일 어디 가")).toBe("question");
    });

    it("returns null when nothing matches", () => {
      expect(punctuator.detectSentenceType("안녕")).toBeNull();
      expect(punctuator.detectSentenceType("   ")).toBeNull();
    });
  });

  describe("addPunctuation", () => {
    it("adds the mark for the detected sentence type", () => {
      expect(punctuator.addPunctuation("밥 먹었니")).toBe("밥 먹었니?");
      expect(punctuator.addPunctuation("정말 예쁘구나")).toBe("정말 예쁘구나!");
      expect(punctuator.addPunctuation("창문 좀 열어 주세요")).toBe("창문 좀 열어 주세요.");
      expect(punctuator.addPunctuation("오늘은 비가 옵니다")).toBe("오늘은 비가 옵니다.");
    });

    it("trims the text it punctuates", () => {
      expect(punctuator.addPunctuation("  밥 먹었니 ")).toBe("밥 먹었니?");
    });

    it("leaves already punctuated text alone", () => {
      expect(punctuator.addPunctuation("이미 끝났다.")).toBe("이미 끝났다.");
      expect(punctuator.addPunctuation("뭐라고?", "aggressive")).toBe("뭐라고?");
    });

    it("leaves everything alone under the none style", () => {
      expect(punctuator.addPunctuation("밥 먹었니", "none")).toBe("밥 먹었니");
    });

    it("returns blank text unchanged", () => {
      expect(punctuator.addPunctuation("  ")).toBe("  ");
    });

    it("does not guess under the conservative style", () => {
      expect(punctuator.addPunctuation("안녕", "conservative")).toBe("안녕");
    });

    it("falls back to an exclamation after an interjection under the aggressive style", () => {
      expect(punctuator.addPunctuation("와 대단해", "aggressive")).toBe("와 대단해!");
    });

    it("falls back to a period under the aggressive style", () => {
      expect(punctuator.addPunctuation("안녕", "aggressive")).toBe("안녕.");
    });
  });

  it("accepts custom rules", () => {
    const custom = new KoreanPunctuator({
      questionEndings: ["까"],
      statementEndings: [],
      commandEndings: [],
      exclamationEndings: [],
      questionWords: [],
      interjections: [],
      terminalPunctuation: ["."],
    });
    expect(custom.addPunctuation("갈까")).toBe("갈까?");
    expect(custom.addPunctuation("밥 먹었니")).toBe("밥 먹었니");
  });
});

describe("parsePunctuationRules", () => {
  it("rejects a non-object", () => {
    expect(() => parsePunctuationRules(null)).toThrow("Punctuation rules must be a JSON object");
  });

  it("names the first missing list", () => {
    expect(() => parsePunctuationRules({})).toThrow('Punctuation rules: "questionEndings" must be an array of strings');
  });

  it("rejects a list with non-string entries", () => {
    const rules = loadPunctuationRules();
    expect(() => parsePunctuationRules({ ...rules, interjections: ["아", 1] })).toThrow(
      'Punctuation rules: "interjections" must be an array of strings',
    );
  });
});

describe("loadPunctuationRules", () => {
  it("loads the bundled rules", () => {
    const rules = loadPunctuationRules();
    expect(rules.questionEndings).toContain("습니까");
    expect(rules.terminalPunctuation).toContain("?");
  });
});

describe("isPunctuationStyle", () => {
  it("accepts the three styles only", () => {
    expect(isPunctuationStyle("none")).toBe(true);
    expect(isPunctuationStyle("conservative")).toBe(true);
    expect(isPunctuationStyle("aggressive")).toBe(true);
    expect(isPunctuationStyle("loud")).toBe(false);
  });
});
