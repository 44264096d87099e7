import { describe, it, expect } from 'vitest';
import {
  isLowQualityReasoning,
  needsReasoningFormatCorrection,
  shouldForceToolFollowup,
  splitReasoning,
} from '../reasoning.js';

const FULL = '<reasoning>\nAnalyze: the parser drops trailing commas\nResearch: read src/parser.ts\nPlan: strip them first\nReflect: covered by a test\n</reasoning>\nDone.';

describe('splitReasoning', () => {
  it('should separate the reasoning block from the answer', () => {
    expect(splitReasoning('<reasoning> think </reasoning> answer')).toEqual({ content: 'answer', reasoning: 'think' });
  });

  it('should return trimmed content when there is no block', () => {
    expect(splitReasoning('  just text ')).toEqual({ content: 'just text' });
  });

  it('should treat an unclosed block as all reasoning', () => {
    expect(splitReasoning('intro <reasoning>still thinking')).toEqual({ content: 'intro', reasoning: 'still thinking' });
  });
});

describe('needsReasoningFormatCorrection', () => {
  it('should ignore replies without a reasoning block', () => {
    expect(needsReasoningFormatCorrection('plain answer')).toBe(false);
    expect(needsReasoningFormatCorrection(undefined)).toBe(false);
  });

  it('should flag blocks missing a section', () => {
    expect(needsReasoningFormatCorrection('<reasoning>Analyze: a\nPlan: b</reasoning>x')).toBe(true);
  });

  it('should accept blocks with all four sections', () => {
    expect(needsReasoningFormatCorrection(FULL)).toBe(false);
  });
});

describe('isLowQualityReasoning', () => {
  it('should accept concrete sections', () => {
    expect(isLowQualityReasoning(FULL)).toBe(false);
  });

  it('should flag placeholder sections', () => {
    expect(isLowQualityReasoning('<reasoning>Analyze: ...\nResearch: n/a\nPlan: none\nReflect: …</reasoning>x')).toBe(true);
  });

  it('should flag a block with only one concrete section', () => {
    expect(isLowQualityReasoning('<reasoning>Analyze: the cache never expires\nPlan: ok</reasoning>x')).toBe(true);
  });

  it('should flag a block with no recognizable sections', () => {
    expect(isLowQualityReasoning('<reasoning>thinking hard about it</reasoning>x')).toBe(true);
  });

  it('should join continuation lines into their section', () => {
    expect(isLowQualityReasoning('<reasoning>Analyze:\nthe cache never expires\nPlan:\nadd a ttl check</reasoning>x')).toBe(false);
  });
});

describe('shouldForceToolFollowup', () => {
  it('should match announced edits case-insensitively', () => {
    expect(shouldForceToolFollowup('Great, I WILL FIX the import.')).toBe(true);
    expect(shouldForceToolFollowup('Now I’ll patch it')).toBe(true);
  });

  it('should ignore ordinary answers', () => {
    expect(shouldForceToolFollowup('The function returns a promise.')).toBe(false);
    expect(shouldForceToolFollowup(undefined)).toBe(false);
  });
});
