/**
 * Recommendation Generator
 *
 * A decision table over a report's counts. Every rule is evaluated once per
 * report, independently of the others, and contributes at most one line.
 */

export interface RecommendationInput {
  engagementScore: number;
  questionCount: number;
  chatCount: number;
}

export const RECOMMENDATIONS = {
  HIGH_ENGAGEMENT: 'High engagement detected - workshop is going well',
  LOW_ENGAGEMENT: 'Low engagement - consider encouraging more participation',
  EXTEND_QA: 'Many questions being asked - consider extending Q&A time',
  PROMPT_FOR_QUESTIONS: 'Few questions - consider prompting for questions',
  GOOD_CHAT: 'Good chat interaction',
  ENCOURAGE_CHAT: 'Encourage more chat participation',
} as const;

type RecommendationRule = (input: RecommendationInput) => string | null;

const RECOMMENDATION_RULES: readonly RecommendationRule[] = [
  ({ engagementScore }) => {
    if (engagementScore > 70) return RECOMMENDATIONS.HIGH_ENGAGEMENT;
    if (engagementScore < 30) return RECOMMENDATIONS.LOW_ENGAGEMENT;
    return null;
  },
  ({ questionCount }) => {
    if (questionCount > 5) return RECOMMENDATIONS.EXTEND_QA;
    if (questionCount < 2) return RECOMMENDATIONS.PROMPT_FOR_QUESTIONS;
    return null;
  },
  ({ chatCount }) =>
    chatCount > 10 ? RECOMMENDATIONS.GOOD_CHAT : RECOMMENDATIONS.ENCOURAGE_CHAT,
];

export function generateRecommendations(input: RecommendationInput): string[] {
  const recommendations: string[] = [];
  for (const rule of RECOMMENDATION_RULES) {
    const line = rule(input);
    if (line !== null) {
      recommendations.push(line);
    }
  }
  return recommendations;
}
