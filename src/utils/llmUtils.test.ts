import { describe, it, expect } from 'vitest';
import { isRecord, parseJsonLenient, stripCodeFences, stripThinkingTags } from './llmUtils';

describe('stripThinkingTags', () => {
  it('removes closed and unclosed blocks', () => {
    expect(stripThinkingTags('<think>a</think>b<thinking>c</thinking>d')).toBe('bd');
    expect(stripThinkingTags('answer<think>cut off')).toBe('answer');
  });
});

describe('stripCodeFences', () => {
  it('unwraps a full block', () => {
    expect(stripCodeFences('```json\n{"a":1}\n```')).toBe('{"a":1}');
    expect(stripCodeFences('```\ntext\n```')).toBe('text');
  });

  it('removes a lone opening or closing fence', () => {
    expect(stripCodeFences('```json\n{"a":1')).toBe('{"a":1');
    expect(stripCodeFences('{"a":1}\n```')).toBe('{"a":1}');
  });

  it('leaves fences inside the text', () => {
    expect(stripCodeFences('{"D":["Type ``` then enter"]}')).toBe('{"D":["Type ``` then enter"]}');
    expect(stripCodeFences('{"a":1} in ```json``` as asked.')).toBe('{"a":1} in ```json``` as asked.');
  });
});

describe('parseJsonLenient', () => {
  it('repairs what JSON.parse rejects', () => {
    expect(parseJsonLenient('{"a":[1,2,]}')).toEqual({ a: [1, 2] });
  });
});

describe('isRecord', () => {
  it('accepts plain objects only', () => {
    expect(isRecord({})).toBe(true);
    expect(isRecord([])).toBe(false);
    expect(isRecord(null)).toBe(false);
  });
});
