/**
 * Keyword rule tables for chat messages. Each table is an ordered list of
 * (predicate, category) pairs; the first predicate that matches decides.
 */

export type MessageIntent = 'technical_issue' | 'general_question';

export type IssueType = 'login' | 'permission' | 'security' | 'setup' | 'deployment' | 'general';

export interface ClassificationRule<C extends string> {
  category: C;
  matches: (lowerMessage: string) => boolean;
}

export const containsAny =
  (keywords: readonly string[]) =>
  (lowerMessage: string): boolean =>
    keywords.some((keyword) => lowerMessage.includes(keyword));

const always = (): boolean => true;

/**
 * Phrases that address a meeting chat line to the assistant
 */
export const BOT_TRIGGERS: readonly string[] = ['@bot', 'question:', 'help', 'stuck', 'issue'];

export const INTENT_RULES: readonly ClassificationRule<MessageIntent>[] = [
  {
    category: 'technical_issue',
    matches: containsAny(['login', 'access', 'permission', 'error', 'stuck', 'deploy']),
  },
  { category: 'general_question', matches: always },
];

export const ISSUE_TYPE_RULES: readonly ClassificationRule<IssueType>[] = [
  { category: 'login', matches: containsAny(['login']) },
  { category: 'permission', matches: containsAny(['permission', 'access', 'iam', 'role']) },
  { category: 'security', matches: containsAny(['security', 'encrypt', 'https', 'acl']) },
  { category: 'setup', matches: containsAny(['setup', 'prepare', 'lab']) },
  { category: 'deployment', matches: containsAny(['deploy', 'error', 'stuck']) },
  { category: 'general', matches: always },
];

export function classify<C extends string>(
  message: string,
  rules: readonly ClassificationRule<C>[],
  fallback: C
): C {
  const lowerMessage = message.toLowerCase();
  const rule = rules.find((candidate) => candidate.matches(lowerMessage));
  return rule ? rule.category : fallback;
}

export function isAddressedToBot(message: string): boolean {
  return containsAny(BOT_TRIGGERS)(message.toLowerCase());
}

export function classifyIntent(message: string): MessageIntent {
  return classify(message, INTENT_RULES, 'general_question');
}

export function classifyIssueType(message: string): IssueType {
  return classify(message, ISSUE_TYPE_RULES, 'general');
}
