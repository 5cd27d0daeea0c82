// Test Factories - Text Data
// Factory functions for creating test chapter content

/**
 * Create a chapter of `count` paragraphs, each exactly `length` characters long
 */
export function createParagraphs(count: number, length: number): string[] {
  return Array.from({ length: count }, (_, index) => {
    const label = `P${index}.`;
    return label + 'x'.repeat(Math.max(0, length - label.length));
  });
}

/**
 * Join paragraphs the way chapter text separates them
 */
export function joinParagraphs(paragraphs: string[]): string {
  return paragraphs.join('\n\n');
}
