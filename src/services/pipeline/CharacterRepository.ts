// Character Repository
// Where a finished chapter's merged cast is handed off for storage

import type { MergedCharacter } from '@/state/types';

export interface CharacterRepository {
  saveCharacters(bookId: string, chapterId: string, characters: readonly MergedCharacter[]): Promise<void>;
}

/**
 * Keeps casts in memory, keyed by book then chapter
 */
export class InMemoryCharacterRepository implements CharacterRepository {
  private readonly books = new Map<string, Map<string, readonly MergedCharacter[]>>();

  async saveCharacters(bookId: string, chapterId: string, characters: readonly MergedCharacter[]): Promise<void> {
    let chapters = this.books.get(bookId);
    if (!chapters) {
      chapters = new Map();
      this.books.set(bookId, chapters);
    }
    chapters.set(chapterId, [...characters]);
  }

  getCharacters(bookId: string, chapterId: string): readonly MergedCharacter[] {
    return this.books.get(bookId)?.get(chapterId) ?? [];
  }

  /** Chapter ids of a book in save order */
  getChapterIds(bookId: string): string[] {
    return Array.from(this.books.get(bookId)?.keys() ?? []);
  }

  clear(): void {
    this.books.clear();
  }
}
