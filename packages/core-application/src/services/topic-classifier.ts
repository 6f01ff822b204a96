import type { TopicRule } from "@file-inventory/core-domain";

function matchesRule(lowerText: string, rule: TopicRule): boolean {
  const allRequired = rule.requiredKeywords.every((kw) => lowerText.includes(kw.toLowerCase()));
  if (!allRequired) return false;

  if (rule.optionalAnyOf.length === 0) return true;
  return rule.optionalAnyOf.some((kw) => lowerText.includes(kw.toLowerCase()));
}

/**
 * Topic names whose rule matches the text, in rule declaration order.
 * Matching is plain case-insensitive substring containment.
 */
export function classifyTopics(text: string, rules: readonly TopicRule[]): string[] {
  const lowerText = text.toLowerCase();
  if (!lowerText.trim()) return [];

  const topics: string[] = [];
  for (const rule of rules) {
    if (matchesRule(lowerText, rule) && !topics.includes(rule.name)) {
      topics.push(rule.name);
    }
  }
  return topics;
}
