import type { ChainGates } from '@/lib/config';
import { ChainGateError } from '@/lib/errors';

export type OutlineSection = { title: string; points: string[] };

export function parseTopics(text: string): string[] {
  return text
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

/** The first topic without its list marker or surrounding quotes. */
export function pickTopic(topics: string[]): string {
  const first = topics[0] ?? '';
  const unlisted = first.replace(/^(?:\d+[.)]|[-•]|\*(?!\*))\s*/, '').replace(/^\*\*(.*)\*\*$/, '$1');
  return unlisted.replace(/^["'“](.*)["'”]$/, '$1').trim();
}

// Non-indented lines open a section; indented lines are its points.
export function parseOutline(text: string): OutlineSection[] {
  const sections: OutlineSection[] = [];
  for (const line of text.split('\n')) {
    if (line.trim().length === 0) continue;
    if (!/^\s/.test(line)) {
      sections.push({ title: line.trim(), points: [] });
    } else if (sections.length > 0) {
      sections[sections.length - 1].points.push(line.trim());
    }
  }
  return sections;
}

export function countWords(text: string): number {
  return text.split(/\s+/).filter((w) => w.length > 0).length;
}

export function checkTopics(text: string, gates: ChainGates): string[] {
  const topics = parseTopics(text);
  if (topics.length < gates.minTopics) {
    throw new ChainGateError('topics', `expected at least ${gates.minTopics} topics, got ${topics.length}`);
  }
  return topics;
}

export function checkOutline(text: string, gates: ChainGates): OutlineSection[] {
  const sections = parseOutline(text);
  if (sections.length < gates.minOutlineSections) {
    throw new ChainGateError('outline', `expected at least ${gates.minOutlineSections} outline sections, got ${sections.length}`);
  }
  return sections;
}

export function checkContent(text: string, gates: ChainGates): number {
  const words = countWords(text);
  if (words < gates.minContentWords) {
    throw new ChainGateError('content', `expected at least ${gates.minContentWords} words, got ${words}`);
  }
  return words;
}

export function checkPolish(draft: string, polished: string): void {
  if (polished.trim() === draft.trim()) {
    throw new ChainGateError('polish', 'polished content is identical to the draft');
  }
}
