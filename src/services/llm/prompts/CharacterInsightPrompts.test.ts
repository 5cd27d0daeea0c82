import { describe, it, expect } from 'vitest';
import { KeyMomentsPrompt } from './KeyMomentsPrompt';
import { MAX_OTHER_CHARACTERS, RelationshipsPrompt, selectOtherCharacters } from './RelationshipsPrompt';
import { VoiceProfilePrompt } from './VoiceProfilePrompt';

describe('KeyMomentsPrompt', () => {
  const prompt = new KeyMomentsPrompt();
  const input = { characterName: 'Tom', chapterText: 'Tom found the map.', chapterTitle: 'The Map' };

  it('names character and chapter in the prompt', () => {
    const user = prompt.buildUserPrompt(input);
    expect(user.startsWith('Extract 2-3 key moments for "Tom" in this chapter.')).toBe(true);
    expect(user).toContain('{"chapter": "The Map", "moment"');
    expect(user).toContain('<TEXT>\nTom found the map.\n</TEXT>');
  });

  it('parses moments, defaulting the chapter to the title', () => {
    const raw = JSON.stringify({
      moments: [
        { chapter: 3, moment: 'Finds the map', significance: 'Starts the quest' },
        { moment: 'Loses his friend' },
        { chapter: 'Ch 1', moment: '' },
      ],
    });

    expect(prompt.parseResponse(raw, input)).toEqual({
      characterName: 'Tom',
      moments: [
        { chapter: '3', moment: 'Finds the map', significance: 'Starts the quest' },
        { chapter: 'The Map', moment: 'Loses his friend', significance: '' },
      ],
    });
  });

  it('returns no moments without a list', () => {
    expect(prompt.parseResponse('{"events": []}', input)).toEqual({ characterName: 'Tom', moments: [] });
  });
});

describe('RelationshipsPrompt', () => {
  const prompt = new RelationshipsPrompt();
  const input = { characterName: 'Tom', chapterText: 'Tom and Ann talked.', otherCharacters: ['Ann', 'tom', 'Ben'] };

  it('excludes the character itself and caps the list', () => {
    expect(selectOtherCharacters('Tom', ['Ann', ' TOM ', 'Ben'])).toEqual(['Ann', 'Ben']);
    const many = Array.from({ length: 30 }, (_, i) => `C${i}`);
    expect(selectOtherCharacters('Tom', many)).toHaveLength(MAX_OTHER_CHARACTERS);
  });

  it('lists the others in the prompt', () => {
    const user = prompt.buildUserPrompt(input);
    expect(user.startsWith('Extract relationships between "Tom" and other characters: Ann, Ben\n')).toBe(true);
  });

  it('parses relationships and drops self references', () => {
    const raw = JSON.stringify({
      relationships: [
        { character: 'Ann', relationship: 'Friend', nature: 'school friends' },
        { character: 'TOM', relationship: 'family' },
        { character: 'Ben' },
      ],
    });

    expect(prompt.parseResponse(raw, input)).toEqual({
      characterName: 'Tom',
      relationships: [
        { character: 'Ann', relationship: 'friend', nature: 'school friends' },
        { character: 'Ben', relationship: 'other', nature: '' },
      ],
    });
  });
});

describe('VoiceProfilePrompt', () => {
  const prompt = new VoiceProfilePrompt();

  it('lists the names and the dialog context', () => {
    const user = prompt.buildUserPrompt({ characterNames: ['Ann', 'Ben'], dialogContext: 'Ann: "Hi"' });
    expect(user.startsWith('Suggest voice profiles for: Ann, Ben\n')).toBe(true);
    expect(user.endsWith('DIALOGS/CONTEXT:\nAnn: "Hi"')).toBe(true);
  });

  it('clamps values and keeps numeric emotion weights', () => {
    const raw = JSON.stringify({
      characters: [
        {
          name: 'Ann',
          gender: 'female',
          age: 'young',
          tone: 'warm',
          accent: 'British',
          voice_profile: { pitch: 1.7, speed: '1.1', energy: 0.2, emotion_bias: { Happy: 0.6, sad: 'lots', angry: 1.5 } },
        },
        { gender: 'male' },
      ],
    });

    expect(prompt.parseResponse(raw).profiles).toEqual([
      {
        characterName: 'Ann',
        gender: 'female',
        age: 'young',
        accent: 'british',
        tone: 'warm',
        pitch: 1.5,
        speed: 1.1,
        energy: 0.5,
        emotionBias: { happy: 0.6, angry: 1 },
      },
    ]);
  });

  it('fills a sparse suggestion with defaults', () => {
    expect(prompt.parseResponse('{"characters":[{"name":"Ben"}]}').profiles).toEqual([
      {
        characterName: 'Ben',
        gender: 'male',
        age: 'middle-aged',
        accent: 'neutral',
        tone: '',
        pitch: 1,
        speed: 1,
        energy: 1,
        emotionBias: {},
      },
    ]);
  });
});
