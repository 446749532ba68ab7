/**
 * Project Skills
 * Skill tags read off a project's title and abstract, plus its category
 */

import projectSkills from '../../config/project-skills.json';

export const PROJECT_SKILL_KEYWORDS: Readonly<Record<string, readonly string[]>> = projectSkills;

const MAX_SKILLS = 5;
// "ai", "ml", "app" would otherwise match inside ordinary words
const SHORT_KEYWORD_LENGTH = 3;

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export function mentions(text: string, keyword: string): boolean {
  if (keyword.length > SHORT_KEYWORD_LENGTH) {
    return text.includes(keyword);
  }
  return new RegExp(`(^|[^a-z0-9])${escapeRegExp(keyword)}($|[^a-z0-9])`).test(text);
}

/**
 * At most five skills, sorted by name
 */
export function extractProjectSkills(title: string, abstract: string | null | undefined, category: string | null): string[] {
  const text = `${title} ${abstract ?? ''}`.toLowerCase();
  const skills = new Set<string>();

  for (const [skill, keywords] of Object.entries(PROJECT_SKILL_KEYWORDS)) {
    if (keywords.some((keyword) => mentions(text, keyword))) {
      skills.add(skill);
    }
  }
  if (category) {
    skills.add(category);
  }

  return [...skills].sort().slice(0, MAX_SKILLS);
}
