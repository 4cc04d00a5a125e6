/**
 * Prompt Builder
 *
 * Builds the single user message sent to the model for a workshop question.
 */

export interface QuestionPromptInput {
  workshopTitle: string;
  /** Relevant catalog entries for the question, one per line */
  relevantContent: readonly string[];
  /** Used when nothing in the catalog matches the question */
  workshopOverview: string;
  question: string;
  participant?: string;
}

export function buildQuestionPrompt(input: QuestionPromptInput): string {
  const context =
    input.relevantContent.length > 0
      ? input.relevantContent.join('\n')
      : input.workshopOverview;

  const asker = input.participant ? `Participant ${input.participant} asked` : 'User Question';

  return `You are a workshop assistant helping participants with the "${input.workshopTitle}" workshop.

Workshop Context:
${context}

${asker}: ${input.question}

Provide helpful, accurate answers about the workshop labs, the security topics they cover, and AWS best practices. Reference specific labs or topics when relevant. If you're not confident about the answer, suggest asking the facilitator.`;
}
