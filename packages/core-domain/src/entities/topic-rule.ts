export interface TopicRule {
  name: string;
  // every keyword must occur
  requiredKeywords: string[];
  // when non-empty, at least one must occur
  optionalAnyOf: string[];
}
