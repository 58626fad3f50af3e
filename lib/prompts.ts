import type { ChainStep } from '@/lib/types';

export type Prompts = Record<ChainStep, string>;

export const SYSTEM_PROMPT = 'You are an experienced blog writer and editor. Follow the requested output format exactly.';

export const defaultPrompts: Prompts = {
  topics: `Generate 5 engaging blog post topics for {audience} in the {domain} domain. Each topic should be unique and interesting.
Return one topic per line and nothing else.`,
  outline: `Create a detailed outline for a blog post about "{topic}", written for {audience} in the {domain} domain.
The other candidate topics were:
{topics}

Put each main section heading on its own line with no indentation, and list the key points of that section below it, each indented by two spaces.`,
  content: `Write the complete blog post that follows this outline. Cover every section and key point in order and use the section headings as Markdown headings.

{outline}`,
  polish: `Edit and polish the following blog post. Improve clarity, fix any grammatical issues and smooth the overall flow. Return only the revised post.

{content}`,
};

/** Replaces `{name}` placeholders; unknown names stay as written. */
export function fillTemplate(template: string, vars: Record<string, string>): string {
  return template.replace(/\{(\w+)\}/g, (match: string, key: string) =>
    Object.prototype.hasOwnProperty.call(vars, key) ? vars[key] : match,
  );
}

export function resolvePrompts(overrides?: Partial<Prompts>): Prompts {
  return { ...defaultPrompts, ...overrides };
}
