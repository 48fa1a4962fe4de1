import type { ComponentAnnotation } from '../../../component_discovery';

export class WordCounter {
  static readonly component: ComponentAnnotation = {
    type: 'service',
    id: 'wordCounter',
    scope: 'transient',
    config: { countPunctuation: false },
  };

  count(text: string): number {
    return text.split(/\s+/).filter(Boolean).length;
  }
}

export function countWords(text: string): number {
  return new WordCounter().count(text);
}
