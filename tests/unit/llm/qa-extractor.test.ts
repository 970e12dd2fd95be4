/**
 * Tests for QA-pair extraction.
 */
import { describe, it, expect } from 'vitest';
import { generateQaPairs, parseQaPairs } from '../../../src/llm/qa-extractor.js';
import {
  QA_PAIRS_SYSTEM_PROMPT,
  buildQaPairsRetryPrompt,
  buildQaPairsUserPrompt,
} from '../../../src/llm/prompts.js';
import { ExternalServiceError, ValidationError, ErrorCodes } from '../../../src/utils/errors.js';
import { ScriptedProvider } from '../../fixtures/fakes.js';

describe('parseQaPairs', () => {
  it('should accept a bare array', () => {
    expect(parseQaPairs('[{"q": "Q1", "a": "A1"}, {"q": "Q2", "a": "A2"}]')).toEqual([
      { q: 'Q1', a: 'A1' },
      { q: 'Q2', a: 'A2' },
    ]);
  });

  it('should accept an object wrapping the list', () => {
    expect(parseQaPairs('{"pairs": [{"q": "Q", "a": "A"}]}')).toEqual([{ q: 'Q', a: 'A' }]);
  });

  it('should accept a single pair object', () => {
    expect(parseQaPairs('{"q": "Q", "a": "A"}')).toEqual([{ q: 'Q', a: 'A' }]);
  });

  it('should accept a fenced code block', () => {
    expect(parseQaPairs('```json\n[{"q": "Q", "a": "A"}]\n```')).toEqual([{ q: 'Q', a: 'A' }]);
  });

  it('should turn scalar answers into text', () => {
    expect(parseQaPairs('[{"q": "How many?", "a": 3}]')).toEqual([{ q: 'How many?', a: '3' }]);
  });

  it('should reject invalid JSON', () => {
    let caught: unknown;
    try {
      parseQaPairs('not json');
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ValidationError);
    expect(caught).toMatchObject({ code: ErrorCodes.INVALID_QA_PAIRS });
    expect(caught instanceof Error ? caught.message : '').toMatch(/^Response is not valid JSON: /);
  });

  it('should reject pairs without q or a', () => {
    expect(() => parseQaPairs('[{"question": "Q", "answer": "A"}]')).toThrow(ValidationError);
    expect(() => parseQaPairs('[{"q": "", "a": "A"}]')).toThrow(/^Invalid QA pair format: /);
  });

  it('should reject a JSON scalar', () => {
    expect(() => parseQaPairs('42')).toThrow('The JSON data is not a list or an object.');
  });
});

describe('generateQaPairs', () => {
  const text = 'Bees communicate the location of food through a waggle dance.';

  it('should send the system prompt and the text', async () => {
    const provider = new ScriptedProvider(['[{"q": "How do bees share food locations?", "a": "With a waggle dance."}]']);

    const pairs = await generateQaPairs(provider, text, { model: 'extractor' });

    expect(pairs).toEqual([{ q: 'How do bees share food locations?', a: 'With a waggle dance.' }]);
    expect(provider.calls).toHaveLength(1);
    expect(provider.calls[0].messages).toEqual([
      { role: 'system', content: QA_PAIRS_SYSTEM_PROMPT },
      { role: 'user', content: buildQaPairsUserPrompt(text) },
    ]);
    expect(provider.calls[0].options).toEqual({ model: 'extractor', json: true });
  });

  it('should retry with the bad response and the error fed back', async () => {
    const provider = new ScriptedProvider([
      '[{"question": "Q"}]',
      '[{"q": "Q", "a": "A"}]',
    ]);

    const pairs = await generateQaPairs(provider, text);

    expect(pairs).toEqual([{ q: 'Q', a: 'A' }]);
    const retry = provider.calls[1].messages;
    expect(retry).toHaveLength(4);
    expect(retry[2]).toEqual({ role: 'assistant', content: '[{"question": "Q"}]' });
    expect(retry[3].role).toBe('user');
    expect(retry[3].content.startsWith('The previous response could not be used: Invalid QA pair format: ')).toBe(true);
  });

  it('should not replay an assistant turn after a failed call', async () => {
    const provider = new ScriptedProvider([
      new ExternalServiceError(ErrorCodes.EXTERNAL_TIMEOUT, 'OpenAI API request timed out after 5ms'),
      '[]',
    ]);

    expect(await generateQaPairs(provider, text)).toEqual([]);
    expect(provider.calls[1].messages).toEqual([
      { role: 'system', content: QA_PAIRS_SYSTEM_PROMPT },
      { role: 'user', content: buildQaPairsUserPrompt(text) },
      { role: 'user', content: buildQaPairsRetryPrompt('OpenAI API request timed out after 5ms') },
    ]);
  });

  it('should return [] after the first attempt and three retries fail', async () => {
    const provider = new ScriptedProvider(['a', 'b', 'c', 'd', '[{"q": "late", "a": "late"}]']);

    expect(await generateQaPairs(provider, text)).toEqual([]);
    expect(provider.calls).toHaveLength(4);
  });

  it('should respect maxRetries', async () => {
    const provider = new ScriptedProvider(['a', '[{"q": "Q", "a": "A"}]']);

    expect(await generateQaPairs(provider, text, { maxRetries: 0 })).toEqual([]);
    expect(provider.calls).toHaveLength(1);
  });
});
