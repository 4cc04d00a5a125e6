/**
 * Troubleshooting Guide
 *
 * Structured steps for the common workshop issue types, and the chat reply
 * built from them.
 */

import type { TroubleshootingData } from '../content/troubleshooting-data';

export interface TroubleshootingPlan {
  issueType: string;
  steps: string[];
  commonCauses: string[];
  errorContext: string;
  escalationThreshold: number;
  nextActions: string[];
}

export class TroubleshootingGuide {
  constructor(private readonly data: TroubleshootingData) {}

  getSteps(issueType: string, errorMessage: string = ''): TroubleshootingPlan {
    const guide = Object.prototype.hasOwnProperty.call(this.data.guides, issueType)
      ? this.data.guides[issueType]
      : this.data.defaultGuide;

    return {
      issueType,
      steps: [...guide.steps],
      commonCauses: [...guide.commonCauses],
      errorContext: errorMessage,
      escalationThreshold: guide.escalationThreshold,
      nextActions: [...this.data.nextActions],
    };
  }
}

export function formatTroubleshootingResponse(
  participant: string,
  plan: TroubleshootingPlan,
  relatedMaterials: readonly string[]
): string {
  let response = `Hi ${participant}! I can help with that ${plan.issueType} issue. Here are some steps to try:\n\n`;
  plan.steps.forEach((step, index) => {
    response += `${index + 1}. ${step}\n`;
  });

  if (relatedMaterials.length > 0) {
    response += '\nRelevant workshop materials:\n';
    for (const material of relatedMaterials) {
      response += `- ${material}\n`;
    }
  }

  return response;
}
